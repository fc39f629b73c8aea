import { compareStrings } from "../utils/compare"

/**
 * Strongly connected components (Tarjan) over ordering edges, each component
 * sorted, components in ascending order of their smallest id.
 */
export function stronglyConnectedComponents(
	adjacency: Map<string, string[]>,
): string[][] {
	let counter = 0
	const index = new Map<string, number>()
	const lowLink = new Map<string, number>()
	const stack: string[] = []
	const onStack = new Set<string>()
	const components: string[][] = []

	const connect = (node: string): void => {
		index.set(node, counter)
		lowLink.set(node, counter)
		counter++
		stack.push(node)
		onStack.add(node)

		for (const next of adjacency.get(node) ?? []) {
			if (!index.has(next)) {
				connect(next)
				lowLink.set(node, Math.min(lowLink.get(node) ?? 0, lowLink.get(next) ?? 0))
			} else if (onStack.has(next)) {
				lowLink.set(node, Math.min(lowLink.get(node) ?? 0, index.get(next) ?? 0))
			}
		}

		if (lowLink.get(node) === index.get(node)) {
			const component: string[] = []
			let member: string | undefined
			do {
				member = stack.pop()
				if (member === undefined) break
				onStack.delete(member)
				component.push(member)
			} while (member !== node)
			components.push(component.sort(compareStrings))
		}
	}

	for (const node of [...adjacency.keys()].sort(compareStrings)) {
		if (!index.has(node)) connect(node)
	}

	return components.sort((a, b) => compareStrings(a[0] ?? "", b[0] ?? ""))
}

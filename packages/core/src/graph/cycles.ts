import type { DiagnosticLog } from "../diagnostics"
import { compareStrings } from "../utils/compare"
import { stronglyConnectedComponents } from "./components"
import type { DependencyGraph } from "./types"

export type Cycle = string[]

export interface CycleReport {
	cycles: Cycle[]
	truncated: boolean
	exploredPaths: number
}

/**
 * Rotate a cycle so it starts at its smallest id. Direction is kept:
 * [c, a, b] becomes [a, b, c], while [a, c, b] is a different cycle.
 */
export function canonicalizeCycle(cycle: readonly string[]): Cycle {
	if (cycle.length === 0) return []
	let start = 0
	for (let i = 1; i < cycle.length; i++) {
		const current = cycle[i]
		const best = cycle[start]
		if (current !== undefined && best !== undefined && current < best) {
			start = i
		}
	}
	return [...cycle.slice(start), ...cycle.slice(0, start)]
}

function compareCycles(a: Cycle, b: Cycle): number {
	if (a.length !== b.length) return a.length - b.length
	for (let i = 0; i < a.length; i++) {
		const order = compareStrings(a[i] ?? "", b[i] ?? "")
		if (order !== 0) return order
	}
	return 0
}

/**
 * Adjacency over ordering edges only, neighbours in ascending id order
 */
export function orderingAdjacency(graph: DependencyGraph): Map<string, string[]> {
	const adjacency = new Map<string, string[]>()
	for (const node of graph.nodes) {
		adjacency.set(node.id, [])
	}
	for (const edge of graph.edges) {
		if (!edge.ordering) continue
		const targets = adjacency.get(edge.from)
		if (targets && !targets.includes(edge.to)) {
			targets.push(edge.to)
		}
	}
	for (const targets of adjacency.values()) {
		targets.sort(compareStrings)
	}
	return adjacency
}

/**
 * Enumerate simple cycles over ordering edges. The search runs inside each
 * strongly connected component of more than one node, following only edges
 * within it, so containers outside any cycle cost nothing. From every start
 * (ascending id) a path can only grow through nodes greater than the start,
 * since any cycle through a smaller node is found from that node. Each path
 * extension counts against `maxPaths`; once reached, the search stops and the
 * cycles found so far are returned.
 */
export function findCycles(
	graph: DependencyGraph,
	options: { maxPaths: number; diagnostics?: DiagnosticLog },
): CycleReport {
	const adjacency = orderingAdjacency(graph)
	const found = new Map<string, Cycle>()
	let explored = 0
	let truncated = false

	const record = (cycle: Cycle) => {
		const canonical = canonicalizeCycle(cycle)
		found.set(canonical.join("\u0000"), canonical)
	}

	for (const component of stronglyConnectedComponents(adjacency)) {
		if (truncated) break
		if (component.length < 2) continue

		const members = new Set(component)
		const within = (node: string) =>
			(adjacency.get(node) ?? []).filter((next) => members.has(next))

		for (const start of component) {
			if (truncated) break

			const path: string[] = []
			const onPath = new Set<string>()

			const visit = (node: string): void => {
				if (truncated) return
				explored++
				if (explored > options.maxPaths) {
					truncated = true
					return
				}

				path.push(node)
				onPath.add(node)

				for (const next of within(node)) {
					if (truncated) break
					if (onPath.has(next)) {
						record(path.slice(path.indexOf(next)))
					} else if (next > start) {
						visit(next)
					}
				}

				path.pop()
				onPath.delete(node)
			}

			visit(start)
		}
	}

	if (truncated) {
		options.diagnostics?.record({
			code: "cycle_enumeration_truncated",
			severity: "warning",
			source: "cycles",
			message: `Cycle enumeration truncated after ${options.maxPaths} paths; ${found.size} cycles found so far`,
		})
	}

	return {
		cycles: [...found.values()].sort(compareCycles),
		truncated,
		exploredPaths: Math.min(explored, options.maxPaths),
	}
}

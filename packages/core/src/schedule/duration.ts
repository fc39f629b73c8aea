import type { ResolverConfig } from "../config"
import type { DependencyGraph } from "../graph/types"
import type { DurationEstimate, MigrationPhase } from "./types"

function round1(value: number): number {
	return Math.round(value * 10) / 10
}

/**
 * Containers taking part in a volume or environment ordering edge carry more
 * integration risk and get the complexity multiplier.
 */
export function complexContainers(graph: DependencyGraph): Set<string> {
	const complex = new Set<string>()
	for (const edge of graph.edges) {
		if (!edge.ordering) continue
		if (edge.kind === "volume_shared" || edge.kind === "env_reference") {
			complex.add(edge.from)
			complex.add(edge.to)
		}
	}
	return complex
}

export function estimateDuration(
	graph: DependencyGraph,
	phases: readonly MigrationPhase[],
	config: Pick<ResolverConfig, "minutesPerContainer" | "complexityMultiplier">,
): DurationEstimate {
	const complex = complexContainers(graph)
	const perContainer: Record<string, number> = {}

	for (const node of graph.nodes) {
		perContainer[node.id] = complex.has(node.id)
			? config.minutesPerContainer * config.complexityMultiplier
			: config.minutesPerContainer
	}

	const minutesOf = (id: string) => perContainer[id] ?? config.minutesPerContainer

	const perPhase = phases.map((phase) => {
		const durations = phase.containers.map(minutesOf)
		const minutes = phase.parallel
			? Math.max(0, ...durations)
			: durations.reduce((sum, d) => sum + d, 0)
		return { phase: phase.index + 1, minutes }
	})

	const sequentialMinutes = graph.nodes.reduce((sum, node) => sum + minutesOf(node.id), 0)
	const parallelMinutes = perPhase.reduce((sum, phase) => sum + phase.minutes, 0)
	const savings =
		sequentialMinutes > 0
			? ((sequentialMinutes - parallelMinutes) / sequentialMinutes) * 100
			: 0

	return {
		totalContainers: graph.nodes.length,
		perContainer,
		perPhase,
		sequentialMinutes,
		parallelMinutes,
		sequentialHours: round1(sequentialMinutes / 60),
		parallelHours: round1(parallelMinutes / 60),
		timeSavingsPercent: round1(Math.min(100, Math.max(0, savings))),
	}
}

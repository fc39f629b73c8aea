import { stronglyConnectedComponents } from "../graph/components"
import type { Cycle } from "../graph/cycles"
import { orderingAdjacency } from "../graph/cycles"
import type { DependencyGraph } from "../graph/types"
import { compareStrings } from "../utils/compare"
import type { MigrationPhase, ParallelGroup, ScheduleUnit } from "./types"

export interface Condensation {
	units: Map<string, ScheduleUnit>
	/** Unit id -> ids of the units it depends on */
	dependencies: Map<string, Set<string>>
	/** Container id -> id of the unit holding it */
	unitOf: Map<string, string>
}

/**
 * Contract every cyclic component into one cluster, identified by its
 * smallest member. The result is acyclic.
 */
export function condense(graph: DependencyGraph): Condensation {
	const adjacency = orderingAdjacency(graph)
	const units = new Map<string, ScheduleUnit>()
	const unitOf = new Map<string, string>()

	for (const component of stronglyConnectedComponents(adjacency)) {
		const [id] = component
		if (id === undefined) continue
		units.set(
			id,
			component.length > 1
				? { kind: "cluster", id, members: component }
				: { kind: "container", id },
		)
		for (const member of component) {
			unitOf.set(member, id)
		}
	}

	const dependencies = new Map<string, Set<string>>()
	for (const id of units.keys()) {
		dependencies.set(id, new Set())
	}
	for (const [from, targets] of adjacency) {
		const fromUnit = unitOf.get(from)
		if (fromUnit === undefined) continue
		for (const to of targets) {
			const toUnit = unitOf.get(to)
			// Edges inside a cluster become self-loops and are dropped
			if (toUnit === undefined || toUnit === fromUnit) continue
			dependencies.get(fromUnit)?.add(toUnit)
		}
	}

	return { units, dependencies, unitOf }
}

/**
 * Layered Kahn ordering: level 0 holds the units with no dependencies,
 * level k the units whose dependencies all sit below k.
 */
export function layerUnits(condensation: Condensation): string[][] {
	const remaining = new Map<string, number>()
	const dependents = new Map<string, string[]>()

	for (const [unit, deps] of condensation.dependencies) {
		remaining.set(unit, deps.size)
		for (const dep of deps) {
			const list = dependents.get(dep) ?? []
			list.push(unit)
			dependents.set(dep, list)
		}
	}

	const layers: string[][] = []
	let current = [...remaining.entries()]
		.filter(([, count]) => count === 0)
		.map(([unit]) => unit)
		.sort(compareStrings)
	let placed = 0

	while (current.length > 0) {
		layers.push(current)
		placed += current.length
		const next: string[] = []
		for (const unit of current) {
			for (const dependent of dependents.get(unit) ?? []) {
				const count = (remaining.get(dependent) ?? 0) - 1
				remaining.set(dependent, count)
				if (count === 0) next.push(dependent)
			}
		}
		current = next.sort(compareStrings)
	}

	if (placed !== condensation.units.size) {
		throw new Error(
			`Condensation is not acyclic: placed ${placed} of ${condensation.units.size} units`,
		)
	}

	return layers
}

function describePlain(level: number, count: number): string {
	const what = count === 1 ? "1 container" : `${count} containers`
	if (level === 0) {
		return `Migrate ${what} with no migration dependencies`
	}
	return `Migrate ${what} whose dependencies are migrated in earlier phases (dependency level ${level})`
}

/**
 * Partition the graph into ordered phases. A dependency always lands in an
 * earlier phase than its dependents; cyclic clusters get a phase each,
 * ahead of the plain containers of the same level.
 */
export function schedulePhases(
	graph: DependencyGraph,
	cycles: readonly Cycle[] = [],
): MigrationPhase[] {
	const condensation = condense(graph)
	const phases: MigrationPhase[] = []

	const push = (phase: Omit<MigrationPhase, "index" | "name">) => {
		const index = phases.length
		phases.push({ index, name: `Phase ${index + 1}`, ...phase })
	}

	layerUnits(condensation).forEach((layer, level) => {
		const plain: string[] = []

		for (const id of layer) {
			const unit = condensation.units.get(id)
			if (!unit) continue
			if (unit.kind === "container") {
				plain.push(unit.id)
				continue
			}

			const members = new Set(unit.members)
			push({
				level,
				containers: unit.members,
				parallel: false,
				manualReview: true,
				description: `Circular dependency between ${unit.members.join(", ")}: migrate as one unit, manual review required`,
				cycles: cycles.filter((cycle) => cycle.every((node) => members.has(node))),
			})
		}

		if (plain.length > 0) {
			push({
				level,
				containers: plain,
				parallel: true,
				manualReview: false,
				description: describePlain(level, plain.length),
			})
		}
	})

	return phases
}

export function parallelGroups(phases: readonly MigrationPhase[]): ParallelGroup[] {
	return phases
		.filter((phase) => phase.parallel && phase.containers.length > 1)
		.map((phase) => ({
			phase: phase.index + 1,
			containers: phase.containers,
			reason: "No interdependencies within group",
		}))
}

/** Phase members in migration order */
export function startupOrder(phases: readonly MigrationPhase[]): string[] {
	return phases.flatMap((phase) => phase.containers)
}

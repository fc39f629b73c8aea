import { describe, expect, test } from "vitest"
import { findCycles } from "../graph/cycles"
import type { DependencyEdge, DependencyGraph } from "../graph/types"
import { condense, schedulePhases } from "./phases"
import type { MigrationPhase } from "./types"

function link(from: string, to: string): DependencyEdge {
	return {
		from,
		to,
		kind: "compose_depends_on",
		ordering: true,
		evidence: [{ kind: "compose_depends_on", via: "compose", service: to }],
	}
}

function graphOf(ids: string[], edges: DependencyEdge[]): DependencyGraph {
	return {
		nodes: ids.map((id) => ({ id, name: id, environment: {}, mounts: [], networks: {} })),
		edges,
	}
}

const members = (phases: MigrationPhase[]) => phases.map((p) => p.containers)

describe("schedulePhases", () => {
	test("puts everything in one parallel phase when nothing is ordered", () => {
		const shared: DependencyEdge = {
			from: "a",
			to: "b",
			kind: "network_shared",
			ordering: false,
			evidence: [{ kind: "network_shared", network: "net" }],
		}
		const phases = schedulePhases(graphOf(["c", "a", "b"], [shared]))

		expect(phases).toHaveLength(1)
		expect(phases[0]).toMatchObject({
			index: 0,
			name: "Phase 1",
			containers: ["a", "b", "c"],
			parallel: true,
			manualReview: false,
		})
	})

	test("migrates dependencies before dependents", () => {
		const phases = schedulePhases(
			graphOf(["db", "api", "web"], [link("api", "db"), link("web", "api")]),
		)

		expect(members(phases)).toEqual([["db"], ["api"], ["web"]])
		expect(phases.map((p) => p.name)).toEqual(["Phase 1", "Phase 2", "Phase 3"])
	})

	test("runs independent dependencies side by side", () => {
		const phases = schedulePhases(
			graphOf(["api", "cache", "db"], [link("api", "cache"), link("api", "db")]),
		)

		expect(members(phases)).toEqual([["cache", "db"], ["api"]])
		expect(phases[0]?.parallel).toBe(true)
	})

	test("places a node after the longest chain below it", () => {
		const phases = schedulePhases(
			graphOf(
				["a", "b", "c", "d"],
				[link("d", "a"), link("d", "c"), link("c", "b"), link("b", "a")],
			),
		)

		expect(members(phases)).toEqual([["a"], ["b"], ["c"], ["d"]])
	})

	test("contracts a cycle into one manual-review phase", () => {
		const graph = graphOf(["a", "b", "c", "d"], [link("a", "b"), link("b", "c"), link("c", "a")])
		const { cycles } = findCycles(graph, { maxPaths: 100 })
		const phases = schedulePhases(graph, cycles)

		expect(phases).toEqual([
			{
				index: 0,
				name: "Phase 1",
				level: 0,
				containers: ["a", "b", "c"],
				parallel: false,
				manualReview: true,
				description:
					"Circular dependency between a, b, c: migrate as one unit, manual review required",
				cycles: [["a", "b", "c"]],
			},
			{
				index: 1,
				name: "Phase 2",
				level: 0,
				containers: ["d"],
				parallel: true,
				manualReview: false,
				description: "Migrate 1 container with no migration dependencies",
			},
		])
	})

	test("orders dependents of a cluster after it", () => {
		const graph = graphOf(
			["a", "b", "e", "f"],
			[link("a", "b"), link("b", "a"), link("e", "a"), link("f", "e")],
		)
		const condensation = condense(graph)

		expect(condensation.unitOf.get("b")).toBe("a")
		expect(members(schedulePhases(graph))).toEqual([["a", "b"], ["e"], ["f"]])
	})

	test("keeps every dependency in an earlier phase on a larger acyclic graph", () => {
		const ids = Array.from({ length: 12 }, (_, i) => `svc-${String(i).padStart(2, "0")}`)
		const edges: DependencyEdge[] = []
		ids.forEach((from, i) => {
			ids.forEach((to, j) => {
				if (j < i && (i * 7 + j * 3) % 4 === 0) edges.push(link(from, to))
			})
		})
		const phases = schedulePhases(graphOf(ids, edges))
		const phaseOf = new Map(phases.flatMap((p) => p.containers.map((id): [string, number] => [id, p.index])))

		expect(edges.length).toBeGreaterThan(0)
		for (const edge of edges) {
			expect(phaseOf.get(edge.to)).toBeLessThan(phaseOf.get(edge.from) ?? -1)
		}
		expect([...phaseOf.keys()].sort()).toEqual(ids)
	})
})

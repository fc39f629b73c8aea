import { describe, expect, test } from "vitest"
import { DiagnosticLog } from "../diagnostics"
import { InvalidSnapshotError } from "../errors"
import { silentLogger } from "../logger"
import type { ContainerNode } from "../snapshot/types"
import { GraphBuilder } from "./builder"
import type { DependencyEdge } from "./types"

function container(id: string): ContainerNode {
	return { id, name: id, environment: {}, mounts: [], networks: {} }
}

function dependsOn(from: string, to: string, service = to): DependencyEdge {
	return {
		from,
		to,
		kind: "compose_depends_on",
		ordering: true,
		evidence: [{ kind: "compose_depends_on", via: "compose", project: "p", service }],
	}
}

function build(ids: string[], edges: DependencyEdge[]) {
	const diagnostics = new DiagnosticLog(silentLogger)
	const builder = new GraphBuilder(diagnostics)
	for (const id of ids) builder.addNode(container(id))
	builder.addEdges(edges)
	return { graph: builder.build(), diagnostics: diagnostics.list() }
}

describe("GraphBuilder", () => {
	test("merges edges identical in from, to and kind and keeps their evidence", () => {
		const { graph } = build(
			["api", "db"],
			[
				dependsOn("api", "db"),
				{
					from: "api",
					to: "db",
					kind: "compose_depends_on",
					ordering: true,
					evidence: [{ kind: "compose_depends_on", via: "label", label: "requires", service: "db" }],
				},
				dependsOn("api", "db"),
			],
		)

		expect(graph.edges).toHaveLength(1)
		expect(graph.edges[0]?.evidence).toEqual([
			{ kind: "compose_depends_on", via: "compose", project: "p", service: "db" },
			{ kind: "compose_depends_on", via: "label", label: "requires", service: "db" },
		])
	})

	test("keeps edges that differ only by kind", () => {
		const { graph } = build(
			["api", "db"],
			[
				dependsOn("api", "db"),
				{
					from: "api",
					to: "db",
					kind: "env_reference",
					ordering: true,
					evidence: [{ kind: "env_reference", variable: "DB_HOST", matched: "db" }],
				},
			],
		)

		expect(graph.edges.map((e) => e.kind)).toEqual(["compose_depends_on", "env_reference"])
	})

	test("a merged edge is ordering when any of its parts is", () => {
		const shared = (ordering: boolean): DependencyEdge => ({
			from: "a",
			to: "b",
			kind: "volume_shared",
			ordering,
			evidence: [
				{ kind: "volume_shared", volume: ordering ? "data" : "logs", relation: ordering ? "reader_writer" : "shared" },
			],
		})

		const { graph } = build(["a", "b"], [shared(false), shared(true)])

		expect(graph.edges).toHaveLength(1)
		expect(graph.edges[0]?.ordering).toBe(true)
		expect(graph.edges[0]?.evidence).toHaveLength(2)
	})

	test("drops dangling edges with a diagnostic", () => {
		const { graph, diagnostics } = build(["web"], [dependsOn("web", "ghost")])

		expect(graph.edges).toEqual([])
		expect(diagnostics).toEqual([
			{
				code: "dangling_reference",
				severity: "warning",
				source: "graph",
				nodeId: "web",
				edge: { from: "web", to: "ghost", kind: "compose_depends_on" },
				message: "Dropped compose_depends_on edge web -> ghost: unknown container ghost",
			},
		])
	})

	test("drops self edges with a diagnostic", () => {
		const { graph, diagnostics } = build(["db"], [dependsOn("db", "db")])

		expect(graph.edges).toEqual([])
		expect(diagnostics.map((d) => d.code)).toEqual(["self_reference"])
	})

	test("sorts nodes and edges regardless of insertion order", () => {
		const edges = [dependsOn("web", "api"), dependsOn("api", "db"), dependsOn("web", "db")]
		const forward = build(["web", "db", "api"], edges).graph
		const backward = build(["api", "db", "web"], [...edges].reverse()).graph

		expect(forward).toEqual(backward)
		expect(forward.nodes.map((n) => n.id)).toEqual(["api", "db", "web"])
		expect(forward.edges.map((e) => `${e.from}->${e.to}`)).toEqual([
			"api->db",
			"web->api",
			"web->db",
		])
	})

	test("returns a frozen graph", () => {
		const { graph } = build(["api", "db"], [dependsOn("api", "db")])

		expect(Object.isFrozen(graph)).toBe(true)
		expect(Object.isFrozen(graph.edges)).toBe(true)
		expect(Object.isFrozen(graph.edges[0])).toBe(true)
	})

	test("rejects an empty node set", () => {
		expect(() => build([], [])).toThrow(InvalidSnapshotError)
	})

	test("rejects duplicate container ids", () => {
		expect(() => build(["db", "db"], [])).toThrow("Duplicate container ID: db")
	})
})

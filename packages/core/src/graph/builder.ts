import type { DiagnosticLog } from "../diagnostics"
import { InvalidSnapshotError } from "../errors"
import type { ContainerNode } from "../snapshot/types"
import { compareStrings } from "../utils/compare"
import {
	type DependencyEdge,
	type DependencyGraph,
	type EdgeEvidence,
	edgeKey,
} from "./types"

function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
	return (
		compareStrings(a.from, b.from) ||
		compareStrings(a.to, b.to) ||
		compareStrings(a.kind, b.kind)
	)
}

function mergeEvidence(
	existing: EdgeEvidence[],
	incoming: EdgeEvidence[],
): EdgeEvidence[] {
	const byKey = new Map<string, EdgeEvidence>()
	for (const evidence of [...existing, ...incoming]) {
		byKey.set(JSON.stringify(evidence), evidence)
	}
	return [...byKey.entries()]
		.sort(([a], [b]) => compareStrings(a, b))
		.map(([, evidence]) => evidence)
}

function deepFreeze<T>(value: T): T {
	if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value)
		for (const child of Object.values(value)) {
			deepFreeze(child)
		}
	}
	return value
}

/**
 * Merges extractor output into one graph. Edges are collected first and only
 * checked, sorted and de-duplicated in build(), so the order batches arrive in
 * has no effect on the result.
 */
export class GraphBuilder {
	private nodes: Map<string, ContainerNode> = new Map()
	private pending: DependencyEdge[] = []

	constructor(private readonly diagnostics: DiagnosticLog) {}

	addNode(node: ContainerNode): this {
		if (this.nodes.has(node.id)) {
			throw new InvalidSnapshotError(`Duplicate container ID: ${node.id}`, [
				`containers: duplicate id ${node.id}`,
			])
		}
		this.nodes.set(node.id, node)
		return this
	}

	addEdge(edge: DependencyEdge): this {
		this.pending.push(edge)
		return this
	}

	addEdges(edges: Iterable<DependencyEdge>): this {
		for (const edge of edges) {
			this.addEdge(edge)
		}
		return this
	}

	hasNode(id: string): boolean {
		return this.nodes.has(id)
	}

	getNode(id: string): ContainerNode | undefined {
		return this.nodes.get(id)
	}

	build(): DependencyGraph {
		if (this.nodes.size === 0) {
			throw new InvalidSnapshotError("Snapshot contains no containers", [
				"containers: empty",
			])
		}

		const merged = new Map<string, DependencyEdge>()

		for (const edge of [...this.pending].sort(compareEdges)) {
			const ref = { from: edge.from, to: edge.to, kind: edge.kind }

			if (edge.from === edge.to) {
				this.diagnostics.record({
					code: "self_reference",
					severity: "info",
					source: "graph",
					nodeId: edge.from,
					edge: ref,
					message: `Dropped ${edge.kind} edge from ${edge.from} to itself`,
				})
				continue
			}

			const missing = [edge.from, edge.to].filter((id) => !this.nodes.has(id))
			if (missing.length > 0) {
				this.diagnostics.record({
					code: "dangling_reference",
					severity: "warning",
					source: "graph",
					nodeId: edge.from,
					edge: ref,
					message: `Dropped ${edge.kind} edge ${edge.from} -> ${edge.to}: unknown container ${missing.join(", ")}`,
				})
				continue
			}

			const key = edgeKey(edge)
			const existing = merged.get(key)
			if (existing) {
				// Same pair and kind: keep one edge, keep all provenance
				merged.set(key, {
					...existing,
					ordering: existing.ordering || edge.ordering,
					evidence: mergeEvidence(existing.evidence, edge.evidence),
				})
			} else {
				merged.set(key, {
					...edge,
					evidence: mergeEvidence([], edge.evidence),
				})
			}
		}

		const nodes = [...this.nodes.values()].sort((a, b) =>
			compareStrings(a.id, b.id),
		)

		return deepFreeze({
			nodes,
			edges: [...merged.values()],
		})
	}
}

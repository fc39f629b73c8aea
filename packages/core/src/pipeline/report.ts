import { z } from "zod"
import type { Diagnostic } from "../diagnostics"
import type { CycleReport } from "../graph/cycles"
import { DependencyKindSchema, EdgeEvidenceSchema } from "../graph/schema"
import type { DependencyGraph } from "../graph/types"
import type { MigrationSequence } from "../schedule/types"
import { sortedUnique } from "../utils/compare"

export const ReportEdgeSchema = z.object({
	from: z.string(),
	to: z.string(),
	type: DependencyKindSchema,
	ordering: z.boolean(),
	evidence: z.array(EdgeEvidenceSchema),
})

export const ReportPhaseSchema = z.object({
	name: z.string(),
	containers: z.array(z.string()),
	parallel: z.boolean(),
	description: z.string(),
	manual_review: z.boolean(),
	estimated_minutes: z.number(),
	cycles: z.array(z.array(z.string())).optional(),
})

export const ContainerSummarySchema = z.object({
	id: z.string(),
	name: z.string(),
	image: z.string().optional(),
	compose_project: z.string().optional(),
	depends_on: z.array(z.string()),
	depended_by: z.array(z.string()),
	shares_with: z.array(z.string()),
	estimated_minutes: z.number(),
})

export const MigrationReportSchema = z
	.object({
		containers: z.record(ContainerSummarySchema),
		dependency_graph: z.object({
			nodes: z.array(z.string()),
			edges: z.array(ReportEdgeSchema),
			cycles: z.array(z.array(z.string()).min(1)),
			cycle_enumeration_truncated: z.boolean(),
			startup_order: z.array(z.string()),
		}),
		migration_sequence: z.object({
			phases: z.array(ReportPhaseSchema),
			parallel_groups: z.array(
				z.object({
					phase: z.number().int().positive(),
					containers: z.array(z.string()),
					reason: z.string(),
				}),
			),
			sequential_order: z.array(z.string()),
			total_phases: z.number().int().nonnegative(),
			estimated_duration: z.object({
				total_containers: z.number().int().nonnegative(),
				estimated_sequential_minutes: z.number(),
				estimated_parallel_minutes: z.number(),
				estimated_sequential_hours: z.number(),
				estimated_parallel_hours: z.number(),
				time_savings_percent: z.number().min(0).max(100),
			}),
		}),
		diagnostics: z.array(
			z.object({
				code: z.enum([
					"malformed_input",
					"dangling_reference",
					"self_reference",
					"cycle_enumeration_truncated",
				]),
				severity: z.enum(["info", "warning"]),
				source: z.enum([
					"snapshot",
					"compose",
					"links",
					"network",
					"volume",
					"environment",
					"graph",
					"cycles",
				]),
				message: z.string(),
				nodeId: z.string().optional(),
				edge: z
					.object({ from: z.string(), to: z.string(), kind: DependencyKindSchema })
					.optional(),
			}),
		),
	})
	.refine(
		(report) => {
			const nodes = new Set(report.dependency_graph.nodes)
			return report.dependency_graph.edges.every((e) => nodes.has(e.from) && nodes.has(e.to))
		},
		{ message: "Edge references non-existent node" },
	)

export type MigrationReport = z.infer<typeof MigrationReportSchema>

/**
 * Build the plain structure handed to report renderers. Every list is
 * already in a deterministic order, so serializing it twice gives the same
 * bytes.
 */
export function buildReport(
	graph: DependencyGraph,
	cycles: CycleReport,
	sequence: MigrationSequence,
	diagnostics: Diagnostic[],
): MigrationReport {
	const { estimate } = sequence
	const containers: MigrationReport["containers"] = {}

	const dependsOn = new Map<string, string[]>()
	const dependedBy = new Map<string, string[]>()
	const sharesWith = new Map<string, string[]>()
	const append = (index: Map<string, string[]>, key: string, id: string) => {
		const ids = index.get(key)
		if (ids) ids.push(id)
		else index.set(key, [id])
	}

	for (const edge of graph.edges) {
		if (edge.ordering) {
			append(dependsOn, edge.from, edge.to)
			append(dependedBy, edge.to, edge.from)
		} else {
			append(sharesWith, edge.from, edge.to)
		}
	}

	for (const node of graph.nodes) {
		containers[node.id] = {
			id: node.id,
			name: node.name,
			...(node.image !== undefined ? { image: node.image } : {}),
			...(node.composeProject !== undefined ? { compose_project: node.composeProject } : {}),
			depends_on: sortedUnique(dependsOn.get(node.id) ?? []),
			depended_by: sortedUnique(dependedBy.get(node.id) ?? []),
			shares_with: sortedUnique(sharesWith.get(node.id) ?? []),
			estimated_minutes: estimate.perContainer[node.id] ?? 0,
		}
	}

	return {
		containers,
		dependency_graph: {
			nodes: graph.nodes.map((node) => node.id),
			edges: graph.edges.map((edge) => ({
				from: edge.from,
				to: edge.to,
				type: edge.kind,
				ordering: edge.ordering,
				evidence: edge.evidence,
			})),
			cycles: cycles.cycles.map((cycle) => [...cycle]),
			cycle_enumeration_truncated: cycles.truncated,
			startup_order: sequence.sequentialOrder,
		},
		migration_sequence: {
			phases: sequence.phases.map((phase) => ({
				name: phase.name,
				containers: phase.containers,
				parallel: phase.parallel,
				description: phase.description,
				manual_review: phase.manualReview,
				estimated_minutes: estimate.perPhase[phase.index]?.minutes ?? 0,
				...(phase.cycles ? { cycles: phase.cycles } : {}),
			})),
			parallel_groups: sequence.parallelGroups,
			sequential_order: sequence.sequentialOrder,
			total_phases: sequence.phases.length,
			estimated_duration: {
				total_containers: estimate.totalContainers,
				estimated_sequential_minutes: estimate.sequentialMinutes,
				estimated_parallel_minutes: estimate.parallelMinutes,
				estimated_sequential_hours: estimate.sequentialHours,
				estimated_parallel_hours: estimate.parallelHours,
				time_savings_percent: estimate.timeSavingsPercent,
			},
		},
		diagnostics,
	}
}

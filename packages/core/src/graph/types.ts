import type { z } from "zod"
import type { ContainerNode } from "../snapshot/types"
import type {
	ComposeEvidenceSchema,
	DependencyKindSchema,
	EdgeEvidenceSchema,
	EnvEvidenceSchema,
	LinkEvidenceSchema,
	NetworkEvidenceSchema,
	VolumeEvidenceSchema,
} from "./schema"

export type DependencyKind = z.infer<typeof DependencyKindSchema>

export type ComposeEvidence = z.infer<typeof ComposeEvidenceSchema>
export type LinkEvidence = z.infer<typeof LinkEvidenceSchema>
export type NetworkEvidence = z.infer<typeof NetworkEvidenceSchema>
export type VolumeEvidence = z.infer<typeof VolumeEvidenceSchema>
export type EnvEvidence = z.infer<typeof EnvEvidenceSchema>
export type EdgeEvidence = z.infer<typeof EdgeEvidenceSchema>

/**
 * `from` depends on `to`. Only ordering edges constrain phase placement;
 * sharing edges are kept as a co-location signal.
 */
export interface DependencyEdge {
	from: string
	to: string
	kind: DependencyKind
	ordering: boolean
	evidence: EdgeEvidence[]
}

export interface DependencyGraph {
	readonly nodes: readonly ContainerNode[]
	readonly edges: readonly DependencyEdge[]
}

export function edgeKey(edge: Pick<DependencyEdge, "from" | "to" | "kind">): string {
	return `${edge.from}\u0000${edge.to}\u0000${edge.kind}`
}

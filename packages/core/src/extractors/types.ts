import type { ExtractorName, ResolverConfig } from "../config"
import type { DiagnosticLog } from "../diagnostics"
import type { DependencyEdge } from "../graph/types"
import type { Snapshot } from "../snapshot/types"
import type { ContainerIndex } from "./resolve"

export interface ExtractorContext {
	config: ResolverConfig
	diagnostics: DiagnosticLog
	index: ContainerIndex
}

export interface Extractor {
	name: ExtractorName
	extract(snapshot: Snapshot, context: ExtractorContext): DependencyEdge[]
}

/**
 * Thrown inside an extractor when one container's data cannot be read.
 * The extractor skips that container and records a diagnostic.
 */
export class MalformedNodeError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "MalformedNodeError"
	}
}

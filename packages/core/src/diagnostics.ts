import type { DependencyKind } from "./graph/types"
import type { Logger } from "./logger"
import { compareStrings } from "./utils/compare"

export type DiagnosticCode =
	| "malformed_input"
	| "dangling_reference"
	| "self_reference"
	| "cycle_enumeration_truncated"

export type DiagnosticSeverity = "info" | "warning"

export type DiagnosticSource =
	| "snapshot"
	| "compose"
	| "links"
	| "network"
	| "volume"
	| "environment"
	| "graph"
	| "cycles"

export interface Diagnostic {
	code: DiagnosticCode
	severity: DiagnosticSeverity
	source: DiagnosticSource
	message: string
	nodeId?: string
	edge?: { from: string; to: string; kind: DependencyKind }
}

function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
	return (
		compareStrings(a.code, b.code) ||
		compareStrings(a.source, b.source) ||
		compareStrings(a.nodeId ?? "", b.nodeId ?? "") ||
		compareStrings(a.message, b.message)
	)
}

/**
 * Collects non-fatal problems for one resolution run and mirrors each one to
 * the logger as it is recorded.
 */
export class DiagnosticLog {
	private entries: Diagnostic[] = []

	constructor(private readonly logger: Logger) {}

	record(diagnostic: Diagnostic): this {
		this.entries.push(diagnostic)
		if (diagnostic.severity === "warning") {
			this.logger.warn(diagnostic.message)
		} else {
			this.logger.info(diagnostic.message)
		}
		return this
	}

	malformed(source: DiagnosticSource, nodeId: string, reason: string): this {
		return this.record({
			code: "malformed_input",
			severity: "warning",
			source,
			nodeId,
			message: `Skipped ${nodeId} in ${source} analysis: ${reason}`,
		})
	}

	get size(): number {
		return this.entries.length
	}

	/** Entries in a stable order, independent of the order they were recorded */
	list(): Diagnostic[] {
		return [...this.entries].sort(compareDiagnostics)
	}
}

import type { z } from "zod"
import type { DiagnosticLog, DiagnosticSource } from "../diagnostics"
import type { DependencyEdge } from "../graph/types"
import { MalformedNodeError } from "./types"

/**
 * Run `extract` for every item, skipping (and reporting) the items whose data
 * turns out to be malformed. An item contributes all of its edges or none.
 */
export function collectEdges<T>(
	source: DiagnosticSource,
	items: readonly T[],
	idOf: (item: T) => string,
	diagnostics: DiagnosticLog,
	extract: (item: T) => DependencyEdge[],
): DependencyEdge[] {
	const edges: DependencyEdge[] = []

	for (const item of items) {
		try {
			edges.push(...extract(item))
		} catch (error) {
			if (!(error instanceof MalformedNodeError)) throw error
			diagnostics.malformed(source, idOf(item), error.message)
		}
	}

	return edges
}

/**
 * Validate one field of one container or throw MalformedNodeError
 */
export function readField<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
	const result = schema.safeParse(value)
	if (!result.success) {
		const issue = result.error.issues[0]
		const path = issue?.path.length ? ` at ${issue.path.join(".")}` : ""
		throw new MalformedNodeError(
			`invalid ${what}${path}: ${issue?.message ?? "unreadable"}`,
		)
	}
	return result.data
}

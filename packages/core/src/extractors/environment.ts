import type { DependencyEdge } from "../graph/types"
import { EnvironmentSchema } from "../snapshot/schema"
import { compareStrings, sortedUnique } from "../utils/compare"
import { collectEdges, readField } from "./run"
import type { Extractor } from "./types"

const HOST_TOKEN = /[A-Za-z0-9_.-]+/g

/**
 * Host-like tokens of a value: "postgres://db:5432/app" -> postgres, db, 5432, app.
 * Dots stay inside a token so "db.internal" never matches "db".
 */
export function hostTokens(value: string): string[] {
	return sortedUnique(value.match(HOST_TOKEN) ?? [])
}

export const environmentExtractor: Extractor = {
	name: "environment",
	extract(snapshot, { diagnostics, index }) {
		return collectEdges(
			"environment",
			snapshot.containers,
			(container) => container.id,
			diagnostics,
			(container) => {
				const environment = readField(EnvironmentSchema, container.environment, "environment")
				const edges: DependencyEdge[] = []

				const variables = Object.keys(environment).sort(compareStrings)
				for (const variable of variables) {
					const value = environment[variable] ?? ""
					for (const token of hostTokens(value)) {
						const targets = sortedUnique([...index.named(token), ...index.aliased(token)])
						for (const to of targets) {
							if (to === container.id) continue
							edges.push({
								from: container.id,
								to,
								kind: "env_reference",
								ordering: true,
								evidence: [{ kind: "env_reference", variable, matched: token }],
							})
						}
					}
				}

				return edges
			},
		)
	},
}

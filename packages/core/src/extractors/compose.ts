import { z } from "zod"
import type { DependencyEdge } from "../graph/types"
import { ComposeDependencySchema, LabelsSchema } from "../snapshot/schema"
import type { ComposeDependency } from "../snapshot/types"
import { requireNonEmpty } from "./resolve"
import { collectEdges, readField } from "./run"
import { type Extractor, MalformedNodeError } from "./types"

/** Container labels that carry startup dependencies */
export const DEPENDENCY_LABELS = [
	"com.docker.compose.depends_on",
	"com.docker.stack.depends_on",
	"depends_on",
	"requires",
] as const

/**
 * Parse a dependency label. Accepts a JSON array (or string) of service names
 * or the compose form "db:service_started:false,cache:service_healthy:true".
 */
export function parseDependencyLabel(value: string): ComposeDependency[] {
	const trimmed = value.trim()

	if (trimmed.startsWith("[") || trimmed.startsWith('"')) {
		let parsed: unknown
		try {
			parsed = JSON.parse(trimmed)
		} catch {
			throw new MalformedNodeError(`dependency label is not valid JSON: ${trimmed}`)
		}
		const names = readField(
			z.union([z.string(), z.array(z.string())]),
			parsed,
			"dependency label",
		)
		return (Array.isArray(names) ? names : [names])
			.map((name) => name.trim())
			.filter((name) => name.length > 0)
			.map((service) => ({ service }))
	}

	const dependencies: ComposeDependency[] = []
	for (const entry of trimmed.split(",")) {
		if (!entry.trim()) continue
		const [service = "", condition] = entry.trim().split(":")
		dependencies.push({
			service: requireNonEmpty(service, "service in dependency label"),
			...(condition ? { condition } : {}),
		})
	}
	return dependencies
}

export const composeExtractor: Extractor = {
	name: "compose",
	extract(snapshot, { diagnostics, index }) {
		const declared = collectEdges(
			"compose",
			snapshot.composeServices,
			(service) => `${service.project}/${service.name}`,
			diagnostics,
			(service) => {
				const edges: DependencyEdge[] = []
				const sources = index.containersFor(service.project, service.name)

				for (const raw of service.dependsOn) {
					const dependency = readField(ComposeDependencySchema, raw, "depends_on entry")
					for (const from of sources) {
						for (const to of index.resolve(dependency.service, service.project)) {
							edges.push({
								from,
								to,
								kind: "compose_depends_on",
								ordering: true,
								evidence: [
									{
										kind: "compose_depends_on",
										via: "compose",
										project: service.project,
										service: dependency.service,
										...(dependency.condition ? { condition: dependency.condition } : {}),
									},
								],
							})
						}
					}
				}

				return edges
			},
		)

		const labelled = collectEdges(
			"compose",
			snapshot.containers,
			(container) => container.id,
			diagnostics,
			(container) => {
				if (container.labels === undefined) return []
				const labels = readField(LabelsSchema, container.labels, "labels")
				const edges: DependencyEdge[] = []

				for (const label of DEPENDENCY_LABELS) {
					const value = labels[label]
					if (value === undefined) continue

					for (const dependency of parseDependencyLabel(value)) {
						for (const to of index.resolve(dependency.service, container.composeProject)) {
							edges.push({
								from: container.id,
								to,
								kind: "compose_depends_on",
								ordering: true,
								evidence: [
									{
										kind: "compose_depends_on",
										via: "label",
										label,
										service: dependency.service,
										...(dependency.condition ? { condition: dependency.condition } : {}),
									},
								],
							})
						}
					}
				}

				return edges
			},
		)

		return [...declared, ...labelled]
	},
}

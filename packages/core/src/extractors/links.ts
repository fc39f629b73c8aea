import type { DependencyEdge } from "../graph/types"
import { LinksSchema } from "../snapshot/schema"
import { requireNonEmpty } from "./resolve"
import { collectEdges, readField } from "./run"
import { type Extractor, MalformedNodeError } from "./types"

export interface ParsedLink {
	target: string
	alias?: string
}

/**
 * Parse a legacy link. The runtime reports "/target:/owner/alias"; compose
 * files declare "target" or "target:alias".
 */
export function parseLink(link: string): ParsedLink {
	const parts = link.trim().split(":")

	if (link.trim().startsWith("/")) {
		const [target = "", path = ""] = parts
		const alias = path.split("/").filter(Boolean).pop()
		return {
			target: requireNonEmpty(target.replace(/^\/+/, ""), "link target"),
			...(alias ? { alias } : {}),
		}
	}

	if (parts.length > 2) {
		throw new MalformedNodeError(`unrecognized link "${link}"`)
	}
	const [target = "", alias] = parts
	return {
		target: requireNonEmpty(target, "link target"),
		...(alias ? { alias } : {}),
	}
}

export const linksExtractor: Extractor = {
	name: "links",
	extract(snapshot, { diagnostics, index }) {
		const linkEdge = (from: string, to: string, link: string, alias?: string): DependencyEdge => ({
			from,
			to,
			kind: "legacy_link",
			ordering: true,
			evidence: [{ kind: "legacy_link", link, ...(alias ? { alias } : {}) }],
		})

		const declared = collectEdges(
			"links",
			snapshot.composeServices,
			(service) => `${service.project}/${service.name}`,
			diagnostics,
			(service) => {
				const edges: DependencyEdge[] = []
				const sources = index.containersFor(service.project, service.name)
				for (const link of service.links) {
					const parsed = parseLink(link)
					for (const from of sources) {
						for (const to of index.resolve(parsed.target, service.project)) {
							edges.push(linkEdge(from, to, link, parsed.alias))
						}
					}
				}
				return edges
			},
		)

		const runtime = collectEdges(
			"links",
			snapshot.containers,
			(container) => container.id,
			diagnostics,
			(container) => {
				if (container.links === undefined) return []
				const links = readField(LinksSchema, container.links, "links")
				return links.flatMap((link) => {
					const parsed = parseLink(link)
					return index
						.resolve(parsed.target, container.composeProject)
						.map((to) => linkEdge(container.id, to, link, parsed.alias))
				})
			},
		)

		return [...declared, ...runtime]
	},
}

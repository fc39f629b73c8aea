import type { DependencyEdge } from "../graph/types"
import { NetworksSchema } from "../snapshot/schema"
import { compareStrings } from "../utils/compare"
import { collectEdges, readField } from "./run"
import type { Extractor } from "./types"

/**
 * Containers sharing a network are co-located, but that says nothing about
 * which starts first: edges go both ways and never constrain ordering.
 */
export const networkExtractor: Extractor = {
	name: "network",
	extract(snapshot, { config, diagnostics }) {
		const ignored = new Set(config.ignoredNetworks)
		const members = new Map<string, Set<string>>()

		// Membership is gathered per container so a bad entry only drops that container
		collectEdges(
			"network",
			snapshot.containers,
			(container) => container.id,
			diagnostics,
			(container) => {
				const networks = readField(NetworksSchema, container.networks, "networks")
				for (const network of Object.keys(networks)) {
					if (ignored.has(network)) continue
					const set = members.get(network) ?? new Set<string>()
					set.add(container.id)
					members.set(network, set)
				}
				return []
			},
		)

		const edges: DependencyEdge[] = []
		for (const [network, ids] of members) {
			if (ids.size < 2) continue
			const sorted = [...ids].sort(compareStrings)
			for (const from of sorted) {
				for (const to of sorted) {
					if (from === to) continue
					edges.push({
						from,
						to,
						kind: "network_shared",
						ordering: false,
						evidence: [{ kind: "network_shared", network }],
					})
				}
			}
		}
		return edges
	},
}

import type { DependencyEdge } from "../graph/types"
import { MountsSchema } from "../snapshot/schema"
import { compareStrings } from "../utils/compare"
import { requireNonEmpty } from "./resolve"
import { collectEdges, readField } from "./run"
import type { Extractor } from "./types"

interface Consumer {
	id: string
	path: string
	readOnly: boolean
}

/**
 * Split a compose volumes_from entry ("service", "service:ro",
 * "container:name:rw") into what it points at.
 */
export function parseVolumesFrom(entry: string): {
	kind: "service" | "container"
	name: string
} {
	const parts = entry.trim().split(":")
	if (parts[0] === "container") {
		return { kind: "container", name: requireNonEmpty(parts[1] ?? "", "volumes_from container") }
	}
	return { kind: "service", name: requireNonEmpty(parts[0] ?? "", "volumes_from service") }
}

function consumersEdges(volume: string, consumers: Consumer[]): DependencyEdge[] {
	const edges: DependencyEdge[] = []

	for (let i = 0; i < consumers.length; i++) {
		for (let j = i + 1; j < consumers.length; j++) {
			const a = consumers[i]
			const b = consumers[j]
			if (!a || !b) continue

			if (a.readOnly !== b.readOnly) {
				// The reader needs the writer's data in place first
				const [reader, writer]: [Consumer, Consumer] = a.readOnly ? [a, b] : [b, a]
				edges.push({
					from: reader.id,
					to: writer.id,
					kind: "volume_shared",
					ordering: true,
					evidence: [
						{
							kind: "volume_shared",
							volume,
							relation: "reader_writer",
							sourcePath: reader.path,
							targetPath: writer.path,
						},
					],
				})
				continue
			}

			for (const [from, to] of [
				[a, b],
				[b, a],
			] as const) {
				edges.push({
					from: from.id,
					to: to.id,
					kind: "volume_shared",
					ordering: false,
					evidence: [
						{
							kind: "volume_shared",
							volume,
							relation: "shared",
							sourcePath: from.path,
							targetPath: to.path,
						},
					],
				})
			}
		}
	}

	return edges
}

export const volumeExtractor: Extractor = {
	name: "volume",
	extract(snapshot, { diagnostics, index }) {
		const byVolume = new Map<string, Map<string, Consumer>>()

		collectEdges(
			"volume",
			snapshot.containers,
			(container) => container.id,
			diagnostics,
			(container) => {
				const mounts = readField(MountsSchema, container.mounts, "mounts")
				const own = new Map<string, Consumer>()

				for (const mount of mounts) {
					if (mount.type === "tmpfs") continue
					const previous = own.get(mount.volume)
					const readOnly = mount.readOnly ?? false
					// Mounted twice: any writable mount makes the container a writer
					own.set(mount.volume, {
						id: container.id,
						path: previous?.path ?? mount.path,
						readOnly: previous ? previous.readOnly && readOnly : readOnly,
					})
				}

				for (const [volume, consumer] of own) {
					const consumers = byVolume.get(volume) ?? new Map<string, Consumer>()
					consumers.set(container.id, consumer)
					byVolume.set(volume, consumers)
				}
				return []
			},
		)

		const shared: DependencyEdge[] = []
		for (const [volume, consumers] of byVolume) {
			if (consumers.size < 2) continue
			const sorted = [...consumers.values()].sort((a, b) => compareStrings(a.id, b.id))
			shared.push(...consumersEdges(volume, sorted))
		}

		const declared = collectEdges(
			"volume",
			snapshot.composeServices,
			(service) => `${service.project}/${service.name}`,
			diagnostics,
			(service) => {
				const sources = index.containersFor(service.project, service.name)
				return service.volumesFrom.flatMap((entry) => {
					const target = parseVolumesFrom(entry)
					const providers =
						target.kind === "container"
							? index.resolve(target.name)
							: index.resolve(target.name, service.project)

					return sources.flatMap((from) =>
						providers.map(
							(to): DependencyEdge => ({
								from,
								to,
								kind: "volume_shared",
								ordering: true,
								evidence: [{ kind: "volume_shared", volume: entry, relation: "volumes_from" }],
							}),
						),
					)
				})
			},
		)

		return [...shared, ...declared]
	},
}

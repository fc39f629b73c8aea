import type { ContainerNode, Snapshot } from "../snapshot/types"
import { compareStrings } from "../utils/compare"
import { MalformedNodeError } from "./types"

function push(map: Map<string, string[]>, key: string, id: string): void {
	const ids = map.get(key)
	if (!ids) {
		map.set(key, [id])
	} else if (!ids.includes(id)) {
		ids.push(id)
		ids.sort(compareStrings)
	}
}

/**
 * Lookup tables from the names a container can be referred to by
 * (compose service, container name, id, network alias) to container ids.
 */
export class ContainerIndex {
	private byId = new Map<string, ContainerNode>()
	private byName = new Map<string, string[]>()
	private byService = new Map<string, string[]>()
	private byAlias = new Map<string, string[]>()

	constructor(snapshot: Snapshot) {
		for (const container of snapshot.containers) {
			this.byId.set(container.id, container)
			push(this.byName, container.name, container.id)
			if (container.composeService) {
				push(
					this.byService,
					serviceKey(container.composeProject ?? "", container.composeService),
					container.id,
				)
			}
			// Aliases are read leniently here; the environment extractor reports bad ones
			if (container.networks && typeof container.networks === "object") {
				for (const aliases of Object.values(container.networks)) {
					if (!Array.isArray(aliases)) continue
					for (const alias of aliases) {
						if (typeof alias === "string" && alias) {
							push(this.byAlias, alias, container.id)
						}
					}
				}
			}
		}
	}

	get(id: string): ContainerNode | undefined {
		return this.byId.get(id)
	}

	/** Containers running a compose service */
	service(project: string, service: string): string[] {
		return this.byService.get(serviceKey(project, service)) ?? []
	}

	named(name: string): string[] {
		return this.byName.get(name) ?? []
	}

	aliased(alias: string): string[] {
		return this.byAlias.get(alias) ?? []
	}

	/**
	 * Resolve a reference to container ids: compose service within the
	 * project, then container name, then id. An unresolvable reference comes
	 * back as-is so the graph builder can report it as dangling.
	 */
	resolve(reference: string, project?: string): string[] {
		if (project !== undefined) {
			const fromService = this.service(project, reference)
			if (fromService.length > 0) return fromService
		}
		const fromName = this.named(reference)
		if (fromName.length > 0) return fromName
		return [reference]
	}

	/** Ids of the containers running a compose service, or the service name itself */
	containersFor(project: string, service: string): string[] {
		const ids = this.service(project, service)
		return ids.length > 0 ? ids : this.resolve(service)
	}
}

function serviceKey(project: string, service: string): string {
	return `${project}\u0000${service}`
}

export function requireNonEmpty(value: string, what: string): string {
	const trimmed = value.trim()
	if (!trimmed) {
		throw new MalformedNodeError(`empty ${what}`)
	}
	return trimmed
}

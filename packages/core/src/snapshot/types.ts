export interface VolumeMount {
	/** Named volume, or the host path of a bind mount */
	volume: string
	/** Path inside the container */
	path: string
	readOnly?: boolean
	type?: "volume" | "bind" | "tmpfs"
}

export interface ContainerNode {
	id: string
	name: string
	image?: string
	environment: Record<string, string>
	mounts: VolumeMount[]
	/** Network name -> aliases the container answers to on that network */
	networks: Record<string, string[]>
	/** Legacy links, either "/target:/owner/alias" or "target[:alias]" */
	links?: string[]
	labels?: Record<string, string>
	composeProject?: string
	composeService?: string
}

export interface ComposeDependency {
	service: string
	condition?: string
}

export interface ComposeService {
	project: string
	name: string
	dependsOn: ComposeDependency[]
	links: string[]
	volumesFrom: string[]
}

export interface Snapshot {
	containers: ContainerNode[]
	composeServices: ComposeService[]
	capturedAt?: string
}

import { parse as parseYaml } from "yaml"
import { z } from "zod"
import { normalizeContainerName } from "../snapshot/schema"
import type {
	ComposeDependency,
	ComposeService,
	ContainerNode,
	Snapshot,
	VolumeMount,
} from "../snapshot/types"

// Parser options for handling complex docker-compose files with many aliases
const yamlParseOptions = {
	// Allow unlimited aliases for large compose files
	maxAliasCount: -1,
	// Enable YAML merge key (<<) support for anchor inheritance
	merge: true,
}

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const KeyValueSchema = z.union([z.record(ScalarSchema), z.array(z.string())])

const ServiceDefinitionSchema = z.object({
	image: z.string().optional(),
	container_name: z.string().optional(),
	environment: KeyValueSchema.optional(),
	labels: KeyValueSchema.optional(),
	depends_on: z
		.union([
			z.array(z.string()),
			z.record(z.object({ condition: z.string().optional() }).passthrough().nullable()),
		])
		.optional(),
	links: z.array(z.string()).optional(),
	volumes_from: z.array(z.string()).optional(),
	volumes: z
		.array(
			z.union([
				z.string(),
				z
					.object({
						type: z.string().optional(),
						source: z.string().optional(),
						target: z.string().optional(),
						read_only: z.boolean().optional(),
					})
					.passthrough(),
			]),
		)
		.optional(),
	networks: z
		.union([
			z.array(z.string()),
			z.record(
				z
					.object({ aliases: z.array(z.string()).optional() })
					.passthrough()
					.nullable(),
			),
		])
		.optional(),
	network_mode: z.string().optional(),
})

const ComposeFileSchema = z.object({
	name: z.string().optional(),
	services: z.record(ServiceDefinitionSchema.nullable()).optional(),
	volumes: z.record(z.unknown()).nullable().optional(),
	networks: z.record(z.unknown()).nullable().optional(),
})

type DockerComposeService = z.infer<typeof ServiceDefinitionSchema>

export class ComposeParseError extends Error {
	constructor(
		message: string,
		public readonly file: string,
	) {
		super(message)
		this.name = "ComposeParseError"
	}
}

export interface ParsedCompose {
	project: string
	services: ComposeService[]
	/** One container per service, as the runtime would name it */
	containers: ContainerNode[]
}

/**
 * Convert "KEY=value" lists and key/value maps to a string record
 */
function toRecord(
	input?: Record<string, string | number | boolean | null> | string[],
): Record<string, string> {
	const record: Record<string, string> = {}
	if (!input) return record

	if (Array.isArray(input)) {
		for (const item of input) {
			const idx = item.indexOf("=")
			if (idx > 0) {
				record[item.slice(0, idx)] = item.slice(idx + 1)
			}
		}
		return record
	}

	for (const [key, value] of Object.entries(input)) {
		// null means "pass through from the host", which we cannot see
		if (value !== null) record[key] = String(value)
	}
	return record
}

function parseDependsOn(
	dependsOn: DockerComposeService["depends_on"],
): ComposeDependency[] {
	if (!dependsOn) return []
	if (Array.isArray(dependsOn)) {
		return dependsOn.map((service) => ({ service }))
	}
	return Object.entries(dependsOn).map(([service, options]) => ({
		service,
		...(options?.condition ? { condition: options.condition } : {}),
	}))
}

/**
 * Parse volume entries like "./data:/app/data", "db-data:/var/lib/data:ro"
 * or the long form. Named volumes are prefixed with the project name the way
 * compose names them on the runtime.
 */
function parseVolume(
	vol: NonNullable<DockerComposeService["volumes"]>[number],
	project: string,
): VolumeMount | null {
	let source: string | undefined
	let target: string | undefined
	let readOnly = false
	let type: VolumeMount["type"]

	if (typeof vol === "object") {
		source = vol.source
		target = vol.target
		readOnly = vol.read_only ?? false
		if (vol.type === "bind" || vol.type === "volume" || vol.type === "tmpfs") {
			type = vol.type
		}
	} else {
		const parts = vol.split(":")
		if (parts.length < 2) return null // anonymous volume
		source = parts[0]
		target = parts[1]
		readOnly = (parts[2] ?? "").split(",").includes("ro")
	}

	if (!source || !target) return null
	if (!type) {
		type =
			source.startsWith("/") || source.startsWith(".") || source.startsWith("~")
				? "bind"
				: "volume"
	}

	return {
		volume: type === "volume" ? `${project}_${source}` : source,
		path: target,
		readOnly,
		type,
	}
}

function parseNetworks(
	service: DockerComposeService,
	serviceName: string,
	project: string,
): Record<string, string[]> {
	// network_mode (host, none, service:x) replaces compose networking
	if (service.network_mode) return {}

	const declared = service.networks ?? ["default"]
	const entries: [string, string[]][] = Array.isArray(declared)
		? declared.map((name): [string, string[]] => [name, []])
		: Object.entries(declared).map(([name, options]): [string, string[]] => [
				name,
				options?.aliases ?? [],
			])

	const networks: Record<string, string[]> = {}
	for (const [name, aliases] of entries) {
		networks[`${project}_${name}`] = [serviceName, ...aliases.filter((a) => a !== serviceName)]
	}
	return networks
}

/**
 * Parse a docker-compose.yml file into compose service definitions and the
 * containers compose would create for them.
 */
export function parseDockerCompose(
	content: string,
	filename: string,
	project: string,
): ParsedCompose {
	let document: unknown
	try {
		document = parseYaml(content, yamlParseOptions)
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new ComposeParseError(`Could not parse ${filename}: ${reason}`, filename)
	}

	const result = ComposeFileSchema.safeParse(document ?? {})
	if (!result.success) {
		const issue = result.error.issues[0]
		throw new ComposeParseError(
			`Invalid compose file ${filename}: ${issue?.path.join(".")} ${issue?.message}`,
			filename,
		)
	}

	const compose = result.data
	const projectName = compose.name ?? project
	const services: ComposeService[] = []
	const containers: ContainerNode[] = []

	for (const [serviceName, raw] of Object.entries(compose.services ?? {})) {
		const service: DockerComposeService = raw ?? {}

		services.push({
			project: projectName,
			name: serviceName,
			dependsOn: parseDependsOn(service.depends_on),
			links: service.links ?? [],
			volumesFrom: service.volumes_from ?? [],
		})

		const name = normalizeContainerName(
			service.container_name ?? `${projectName}-${serviceName}-1`,
		)
		const mounts = (service.volumes ?? [])
			.map((vol) => parseVolume(vol, projectName))
			.filter((m): m is VolumeMount => m !== null)
		const labels = toRecord(service.labels)

		containers.push({
			id: name,
			name,
			...(service.image ? { image: service.image } : {}),
			environment: toRecord(service.environment),
			mounts,
			networks: parseNetworks(service, serviceName, projectName),
			...(Object.keys(labels).length > 0 ? { labels } : {}),
			composeProject: projectName,
			composeService: serviceName,
		})
	}

	return { project: projectName, services, containers }
}

/**
 * Snapshot made only from compose files, for when no runtime inventory exists
 */
export function composeSnapshot(files: ParsedCompose[]): Snapshot {
	return {
		containers: files.flatMap((file) => file.containers),
		composeServices: files.flatMap((file) => file.services),
	}
}

/**
 * Attach compose definitions to a runtime snapshot. Runtime containers win;
 * compose containers are not added.
 */
export function withComposeServices(snapshot: Snapshot, files: ParsedCompose[]): Snapshot {
	return {
		...snapshot,
		composeServices: [...snapshot.composeServices, ...files.flatMap((file) => file.services)],
	}
}

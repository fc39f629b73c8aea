import { z } from "zod"
import { DiagnosticLog } from "../diagnostics"
import { InvalidSnapshotError } from "../errors"
import { type Logger, silentLogger } from "../logger"
import type { ContainerNode, Snapshot, VolumeMount } from "./types"

export const VolumeMountSchema = z.object({
	volume: z.string().min(1),
	path: z.string(),
	readOnly: z.boolean().optional(),
	type: z.enum(["volume", "bind", "tmpfs"]).optional(),
})

export const EnvironmentSchema = z.record(z.string())
export const MountsSchema = z.array(VolumeMountSchema)
export const NetworksSchema = z.record(z.array(z.string()))
export const LinksSchema = z.array(z.string())
export const LabelsSchema = z.record(z.string())

export const ComposeDependencySchema = z.object({
	service: z.string().min(1),
	condition: z.string().optional(),
})

export const ComposeServiceSchema = z.object({
	project: z.string(),
	name: z.string().min(1),
	dependsOn: z.array(ComposeDependencySchema).default([]),
	links: z.array(z.string()).default([]),
	volumesFrom: z.array(z.string()).default([]),
})

// Only identity is checked up front; the remaining fields are validated one
// by one so a single bad field never rejects the whole inventory.
const ContainerEnvelopeSchema = z.object({
	id: z.string().min(1),
	name: z.string().min(1),
	image: z.string().optional(),
	environment: z.unknown().optional(),
	mounts: z.unknown().optional(),
	networks: z.unknown().optional(),
	links: z.unknown().optional(),
	labels: z.unknown().optional(),
	composeProject: z.string().optional(),
	composeService: z.string().optional(),
})

export const SnapshotSchema = z
	.object({
		containers: z.array(ContainerEnvelopeSchema),
		composeServices: z.array(ComposeServiceSchema).default([]),
		capturedAt: z.string().optional(),
	})
	.refine((snapshot) => snapshot.containers.length > 0, {
		message: "Snapshot contains no containers",
	})
	.refine(
		(snapshot) => {
			const ids = snapshot.containers.map((c) => c.id)
			return new Set(ids).size === ids.length
		},
		{ message: "Duplicate container IDs detected" },
	)

export interface ParsedSnapshot {
	snapshot: Snapshot
	diagnostics: DiagnosticLog
}

/**
 * Runtimes report container names with a leading slash
 */
export function normalizeContainerName(name: string): string {
	return name.replace(/^\/+/, "")
}

function field<T>(
	schema: z.ZodType<T>,
	value: unknown,
	fallback: T,
	onInvalid: (reason: string) => void,
): T {
	if (value === undefined) return fallback
	const result = schema.safeParse(value)
	if (result.success) return result.data
	onInvalid(result.error.issues[0]?.message ?? "invalid value")
	return fallback
}

/**
 * Validate an inventory document (usually read from JSON) into a Snapshot.
 * Throws InvalidSnapshotError when the document cannot yield a graph at all;
 * unreadable fields of a single container are dropped and reported.
 */
export function parseSnapshot(
	input: unknown,
	options?: { logger?: Logger; diagnostics?: DiagnosticLog },
): ParsedSnapshot {
	const diagnostics =
		options?.diagnostics ?? new DiagnosticLog(options?.logger ?? silentLogger)
	const result = SnapshotSchema.safeParse(input)

	if (!result.success) {
		const issues = result.error.issues.map((issue) => {
			const path = issue.path.join(".")
			return path ? `${path}: ${issue.message}` : issue.message
		})
		throw new InvalidSnapshotError(
			`Invalid snapshot: ${issues.join("; ")}`,
			issues,
		)
	}

	const containers = result.data.containers.map((raw): ContainerNode => {
		const invalid = (name: string) => (reason: string) =>
			diagnostics.malformed("snapshot", raw.id, `${name} ignored (${reason})`)

		return {
			id: raw.id,
			name: normalizeContainerName(raw.name),
			image: raw.image,
			environment: field<Record<string, string>>(
				EnvironmentSchema,
				raw.environment,
				{},
				invalid("environment"),
			),
			mounts: field<VolumeMount[]>(MountsSchema, raw.mounts, [], invalid("mounts")),
			networks: field<Record<string, string[]>>(
				NetworksSchema,
				raw.networks,
				{},
				invalid("networks"),
			),
			links: field<string[] | undefined>(
				LinksSchema.optional(),
				raw.links,
				undefined,
				invalid("links"),
			),
			labels: field<Record<string, string> | undefined>(
				LabelsSchema.optional(),
				raw.labels,
				undefined,
				invalid("labels"),
			),
			composeProject: raw.composeProject,
			composeService: raw.composeService,
		}
	})

	return {
		snapshot: {
			containers,
			composeServices: result.data.composeServices,
			capturedAt: result.data.capturedAt,
		},
		diagnostics,
	}
}

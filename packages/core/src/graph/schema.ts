import { z } from "zod"

export const DependencyKindSchema = z.enum([
	"compose_depends_on",
	"legacy_link",
	"network_shared",
	"volume_shared",
	"env_reference",
])

export const ComposeEvidenceSchema = z.object({
	kind: z.literal("compose_depends_on"),
	/** Where the declaration was found */
	via: z.enum(["compose", "label"]),
	project: z.string().optional(),
	service: z.string().optional(),
	label: z.string().optional(),
	condition: z.string().optional(),
})

export const LinkEvidenceSchema = z.object({
	kind: z.literal("legacy_link"),
	link: z.string(),
	alias: z.string().optional(),
})

export const NetworkEvidenceSchema = z.object({
	kind: z.literal("network_shared"),
	network: z.string(),
})

export const VolumeEvidenceSchema = z.object({
	kind: z.literal("volume_shared"),
	volume: z.string(),
	// reader_writer: read-only consumer of a volume another container writes
	// shared: both mount it with the same mode
	// volumes_from: compose volumes_from declaration
	relation: z.enum(["reader_writer", "shared", "volumes_from"]),
	sourcePath: z.string().optional(),
	targetPath: z.string().optional(),
})

export const EnvEvidenceSchema = z.object({
	kind: z.literal("env_reference"),
	variable: z.string(),
	/** Name or alias the value matched */
	matched: z.string(),
})

export const EdgeEvidenceSchema = z.discriminatedUnion("kind", [
	ComposeEvidenceSchema,
	LinkEvidenceSchema,
	NetworkEvidenceSchema,
	VolumeEvidenceSchema,
	EnvEvidenceSchema,
])

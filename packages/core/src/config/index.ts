/**
 * Resolver configuration: defaults, config file and environment overrides
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs"
import { homedir } from "node:os"
import { dirname, join } from "node:path"
import { z } from "zod"
import { ConfigError } from "../errors"

export const ExtractorTogglesSchema = z.object({
	compose: z.boolean().default(true),
	links: z.boolean().default(true),
	network: z.boolean().default(true),
	volume: z.boolean().default(true),
	environment: z.boolean().default(true),
})

export const ResolverConfigSchema = z.object({
	/** Flat migration estimate for one container */
	minutesPerContainer: z.number().positive().default(5),
	/** Applied to containers with volume or environment ordering edges */
	complexityMultiplier: z.number().min(1).default(1.5),
	/** Upper bound on DFS paths explored while enumerating cycles */
	maxCyclePaths: z.number().int().positive().default(10_000),
	extractors: ExtractorTogglesSchema.default({}),
	/** Runtime default networks that say nothing about co-location */
	ignoredNetworks: z.array(z.string()).default(["bridge", "host", "none"]),
})

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>
export type ResolverConfigInput = z.input<typeof ResolverConfigSchema>
export type ExtractorToggles = z.infer<typeof ExtractorTogglesSchema>
export type ExtractorName = keyof ExtractorToggles

export const EXTRACTOR_NAMES: readonly ExtractorName[] = [
	"compose",
	"links",
	"network",
	"volume",
	"environment",
]

export function isExtractorName(value: string): value is ExtractorName {
	return EXTRACTOR_NAMES.some((name) => name === value)
}

/**
 * Apply defaults and validate
 */
export function resolveConfig(input?: ResolverConfigInput): ResolverConfig {
	const result = ResolverConfigSchema.safeParse(input ?? {})
	if (!result.success) {
		const issue = result.error.issues[0]
		const path = issue?.path.join(".") ?? ""
		throw new ConfigError(
			`Invalid configuration${path ? ` at ${path}` : ""}: ${issue?.message ?? "unknown error"}`,
		)
	}
	return result.data
}

/**
 * Later layers win; extractor toggles merge key by key
 */
export function mergeConfig(
	...layers: (ResolverConfigInput | undefined)[]
): ResolverConfigInput {
	let merged: ResolverConfigInput = {}
	for (const layer of layers) {
		if (!layer) continue
		merged = {
			...merged,
			...layer,
			extractors: { ...merged.extractors, ...layer.extractors },
		}
	}
	return merged
}

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
	return join(homedir(), ".config", "podplan", "config.json")
}

/**
 * Load config from disk. A missing file is an empty config; an unreadable
 * one is an error.
 */
export function loadConfig(configPath = getConfigPath()): ResolverConfigInput {
	if (!existsSync(configPath)) {
		return {}
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(readFileSync(configPath, "utf-8"))
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new ConfigError(`Could not read config file ${configPath}: ${reason}`)
	}

	const result = ResolverConfigSchema.partial().safeParse(parsed)
	if (!result.success) {
		const issue = result.error.issues[0]
		throw new ConfigError(
			`Invalid config file ${configPath}: ${issue?.path.join(".")} ${issue?.message}`,
		)
	}
	return result.data
}

/**
 * Save config to disk
 */
export function saveConfig(
	config: ResolverConfigInput,
	configPath = getConfigPath(),
): void {
	const configDir = dirname(configPath)

	if (!existsSync(configDir)) {
		mkdirSync(configDir, { recursive: true })
	}

	writeFileSync(configPath, JSON.stringify(config, null, 2))
}

function parseNumber(name: string, raw: string | undefined): number | undefined {
	if (raw === undefined || raw.trim() === "") return undefined
	const value = Number(raw)
	if (Number.isNaN(value)) {
		throw new ConfigError(`${name} must be a number, got "${raw}"`)
	}
	return value
}

/**
 * Read PODPLAN_* overrides from the environment
 */
export function configFromEnv(
	env: NodeJS.ProcessEnv = process.env,
): ResolverConfigInput {
	const config: ResolverConfigInput = {}

	const minutes = parseNumber(
		"PODPLAN_MINUTES_PER_CONTAINER",
		env.PODPLAN_MINUTES_PER_CONTAINER,
	)
	if (minutes !== undefined) config.minutesPerContainer = minutes

	const multiplier = parseNumber(
		"PODPLAN_COMPLEXITY_MULTIPLIER",
		env.PODPLAN_COMPLEXITY_MULTIPLIER,
	)
	if (multiplier !== undefined) config.complexityMultiplier = multiplier

	const maxPaths = parseNumber("PODPLAN_MAX_CYCLE_PATHS", env.PODPLAN_MAX_CYCLE_PATHS)
	if (maxPaths !== undefined) config.maxCyclePaths = maxPaths

	const disabled = env.PODPLAN_DISABLE_EXTRACTORS
	if (disabled) {
		config.extractors = disabledExtractors(disabled.split(","))
	}

	return config
}

/**
 * Toggle map with the named extractors switched off
 */
export function disabledExtractors(names: string[]): Partial<ExtractorToggles> {
	const toggles: Partial<ExtractorToggles> = {}
	for (const raw of names) {
		const name = raw.trim()
		if (!name) continue
		if (!isExtractorName(name)) {
			throw new ConfigError(
				`Unknown extractor "${name}" (expected one of ${EXTRACTOR_NAMES.join(", ")})`,
			)
		}
		toggles[name] = false
	}
	return toggles
}

/**
 * Defaults < config file < environment < explicit overrides
 */
export function loadResolverConfig(options?: {
	configPath?: string
	env?: NodeJS.ProcessEnv
	overrides?: ResolverConfigInput
}): ResolverConfig {
	return resolveConfig(
		mergeConfig(
			loadConfig(options?.configPath),
			configFromEnv(options?.env),
			options?.overrides,
		),
	)
}

/**
 * Main analyze command - loads an inventory and/or compose files and prints
 * the migration plan
 */

import { readFile, readdir, writeFile } from "node:fs/promises"
import { basename, join, resolve } from "node:path"
import {
	type Logger,
	type MigrationPlan,
	type ParsedCompose,
	type ResolverConfigInput,
	type Snapshot,
	DiagnosticLog,
	composeSnapshot,
	createConsoleLogger,
	disabledExtractors,
	loadResolverConfig,
	parseDockerCompose,
	parseSnapshot,
	resolveMigrationPlan,
	withComposeServices,
} from "@podplan/core"
import { formatPlanSummary } from "./utils/output"

export interface AnalyzeOptions {
	compose?: string[]
	project?: string
	output?: string
	json?: boolean
	minutesPerContainer?: number
	complexityMultiplier?: number
	maxCyclePaths?: number
	disable?: string[]
	verbose?: boolean
}

export function isComposeFileName(fileName: string): boolean {
	const name = fileName.toLowerCase()
	return (
		name.includes("docker-compose") ||
		name === "compose.yml" ||
		name === "compose.yaml"
	)
}

/**
 * Detect compose files in a directory
 */
async function detectComposeFiles(dirPath: string): Promise<string[]> {
	const entries = await readdir(dirPath, { withFileTypes: true })
	return entries
		.filter((entry) => entry.isFile() && isComposeFileName(entry.name))
		.map((entry) => join(dirPath, entry.name))
		.sort()
}

async function loadComposeFiles(
	paths: string[],
	project: string | undefined,
	logger: Logger,
): Promise<ParsedCompose[]> {
	const parsed: ParsedCompose[] = []
	for (const path of paths) {
		logger.debug(`Parsing Docker Compose: ${path}`)
		const content = await readFile(path, "utf-8")
		// Compose names a project after the directory holding the file
		const projectName = project ?? basename(resolve(path, ".."))
		parsed.push(parseDockerCompose(content, basename(path), projectName))
	}
	return parsed
}

function configOverrides(options: AnalyzeOptions): ResolverConfigInput {
	const overrides: ResolverConfigInput = {}
	if (options.minutesPerContainer !== undefined)
		overrides.minutesPerContainer = options.minutesPerContainer
	if (options.complexityMultiplier !== undefined)
		overrides.complexityMultiplier = options.complexityMultiplier
	if (options.maxCyclePaths !== undefined) overrides.maxCyclePaths = options.maxCyclePaths
	if (options.disable?.length) overrides.extractors = disabledExtractors(options.disable)
	return overrides
}

/**
 * Build the snapshot and resolve it into a migration plan
 */
export async function analyze(
	inventoryPath: string | undefined,
	options: AnalyzeOptions = {},
	logger: Logger = createConsoleLogger({ verbose: options.verbose }),
): Promise<MigrationPlan> {
	const config = loadResolverConfig({ overrides: configOverrides(options) })
	const diagnostics = new DiagnosticLog(logger)

	const composePaths = options.compose?.length
		? options.compose.map((f) => resolve(f))
		: await detectComposeFiles(process.cwd())
	if (composePaths.length === 0) {
		logger.info("No Docker Compose files found")
	}
	const composeFiles = await loadComposeFiles(composePaths, options.project, logger)

	let snapshot: Snapshot
	if (inventoryPath) {
		const content = await readFile(resolve(inventoryPath), "utf-8")
		const parsed = parseSnapshot(JSON.parse(content), { diagnostics })
		snapshot = withComposeServices(parsed.snapshot, composeFiles)
	} else {
		snapshot = composeSnapshot(composeFiles)
	}

	return resolveMigrationPlan(snapshot, { config, logger, diagnostics })
}

/**
 * CLI entry for `podplan analyze`
 */
export async function runAnalyze(
	inventoryPath: string | undefined,
	options: AnalyzeOptions,
): Promise<void> {
	// Keep stdout clean for JSON output
	const logger = createConsoleLogger({ verbose: options.verbose })
	const plan = await analyze(
		inventoryPath,
		options,
		options.json && !options.output ? { ...logger, info: () => {} } : logger,
	)
	const json = `${JSON.stringify(plan.report, null, 2)}\n`

	if (options.output) {
		const outputPath = resolve(options.output)
		await writeFile(outputPath, json)
		console.log(`\x1b[32m✓\x1b[0m Saved: ${outputPath}`)
	}

	if (options.json && !options.output) {
		process.stdout.write(json)
		return
	}

	console.log(formatPlanSummary(plan.report))
}

import { type ResolverConfig, type ResolverConfigInput, resolveConfig } from "../config"
import { type Diagnostic, DiagnosticLog } from "../diagnostics"
import { type Extractor, runExtractors } from "../extractors"
import { GraphBuilder } from "../graph/builder"
import { type CycleReport, findCycles } from "../graph/cycles"
import type { DependencyGraph } from "../graph/types"
import { type Logger, silentLogger } from "../logger"
import { estimateDuration } from "../schedule/duration"
import { parallelGroups, schedulePhases, startupOrder } from "../schedule/phases"
import type { MigrationSequence } from "../schedule/types"
import { normalizeContainerName, parseSnapshot } from "../snapshot/schema"
import type { Snapshot } from "../snapshot/types"
import { type MigrationReport, buildReport } from "./report"

export * from "./report"

export interface ResolveOptions {
	config?: ResolverConfigInput
	logger?: Logger
	/** Replace the built-in extractor set */
	extractors?: readonly Extractor[]
	/** Continue an existing log, e.g. the one parseSnapshot filled */
	diagnostics?: DiagnosticLog
}

export interface MigrationPlan {
	config: ResolverConfig
	graph: DependencyGraph
	cycles: CycleReport
	sequence: MigrationSequence
	diagnostics: Diagnostic[]
	report: MigrationReport
}

/**
 * Resolve a snapshot into a dependency graph and a phased migration plan.
 *
 * Extraction runs to completion before the merged graph is built; cycle
 * detection, scheduling and estimation then work on the frozen graph.
 * Recoverable problems end up in `diagnostics`; an unusable snapshot throws
 * InvalidSnapshotError.
 */
export function resolveMigrationPlan(
	snapshot: Snapshot,
	options?: ResolveOptions,
): MigrationPlan {
	const config = resolveConfig(options?.config)
	const logger = options?.logger ?? silentLogger
	const diagnostics = options?.diagnostics ?? new DiagnosticLog(logger)

	const normalized: Snapshot = {
		...snapshot,
		containers: snapshot.containers.map((container) => ({
			...container,
			name: normalizeContainerName(container.name),
		})),
	}

	logger.debug(`Resolving ${normalized.containers.length} containers`)

	const builder = new GraphBuilder(diagnostics)
	for (const container of normalized.containers) {
		builder.addNode(container)
	}
	builder.addEdges(
		runExtractors(normalized, {
			config,
			diagnostics,
			logger,
			extractors: options?.extractors,
		}),
	)
	const graph = builder.build()
	logger.debug(`Graph: ${graph.nodes.length} nodes, ${graph.edges.length} edges`)

	const cycles = findCycles(graph, { maxPaths: config.maxCyclePaths, diagnostics })
	if (cycles.cycles.length > 0) {
		logger.warn(`Detected ${cycles.cycles.length} dependency cycles`)
		for (const cycle of cycles.cycles) {
			logger.debug(`  Cycle: ${[...cycle, cycle[0]].join(" -> ")}`)
		}
	}

	const phases = schedulePhases(graph, cycles.cycles)
	const sequence: MigrationSequence = {
		phases,
		parallelGroups: parallelGroups(phases),
		sequentialOrder: startupOrder(phases),
		estimate: estimateDuration(graph, phases, config),
	}
	logger.debug(`Generated migration sequence with ${phases.length} phases`)

	const recorded = diagnostics.list()
	return {
		config,
		graph,
		cycles,
		sequence,
		diagnostics: recorded,
		report: buildReport(graph, cycles, sequence, recorded),
	}
}

/**
 * Validate a raw inventory document, then resolve it
 */
export function resolveInventory(
	document: unknown,
	options?: Omit<ResolveOptions, "diagnostics">,
): MigrationPlan {
	const { snapshot, diagnostics } = parseSnapshot(document, {
		logger: options?.logger ?? silentLogger,
	})
	return resolveMigrationPlan(snapshot, { ...options, diagnostics })
}

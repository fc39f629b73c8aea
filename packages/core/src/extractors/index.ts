import type { ResolverConfig } from "../config"
import type { DiagnosticLog } from "../diagnostics"
import type { DependencyEdge } from "../graph/types"
import type { Logger } from "../logger"
import type { Snapshot } from "../snapshot/types"
import { composeExtractor } from "./compose"
import { environmentExtractor } from "./environment"
import { linksExtractor } from "./links"
import { networkExtractor } from "./network"
import { ContainerIndex } from "./resolve"
import type { Extractor } from "./types"
import { volumeExtractor } from "./volume"

export * from "./types"
export { ContainerIndex } from "./resolve"
export { DEPENDENCY_LABELS, parseDependencyLabel } from "./compose"
export { parseLink } from "./links"
export { parseVolumesFrom } from "./volume"
export { hostTokens } from "./environment"
export {
	composeExtractor,
	environmentExtractor,
	linksExtractor,
	networkExtractor,
	volumeExtractor,
}

export const EXTRACTORS: readonly Extractor[] = [
	composeExtractor,
	linksExtractor,
	networkExtractor,
	volumeExtractor,
	environmentExtractor,
]

/**
 * Run every enabled extractor over the snapshot. Extractors share nothing
 * but read-only input; the graph builder sorts their combined output.
 */
export function runExtractors(
	snapshot: Snapshot,
	options: {
		config: ResolverConfig
		diagnostics: DiagnosticLog
		logger: Logger
		extractors?: readonly Extractor[]
	},
): DependencyEdge[] {
	const index = new ContainerIndex(snapshot)
	const context = { config: options.config, diagnostics: options.diagnostics, index }
	const edges: DependencyEdge[] = []

	for (const extractor of options.extractors ?? EXTRACTORS) {
		if (!options.config.extractors[extractor.name]) {
			options.logger.debug(`Extractor ${extractor.name} disabled`)
			continue
		}
		const found = extractor.extract(snapshot, context)
		options.logger.debug(`Extractor ${extractor.name}: ${found.length} edges`)
		edges.push(...found)
	}

	return edges
}

import type { Diagnostic, MigrationReport } from "@podplan/core"

const RED = "\x1b[31m"
const GREEN = "\x1b[32m"
const YELLOW = "\x1b[33m"
const RESET = "\x1b[0m"

/**
 * Format a duration in minutes to a human readable string
 */
export function formatMinutes(minutes: number): string {
	if (minutes < 60) return `${Number(minutes.toFixed(1))}m`
	const hours = Math.floor(minutes / 60)
	const rest = Math.round(minutes - hours * 60)
	return rest > 0 ? `${hours}h ${rest}m` : `${hours}h`
}

type ReportPhase = MigrationReport["migration_sequence"]["phases"][number]

/**
 * Format one phase for console output
 */
export function formatPhase(phase: ReportPhase): string {
	const marker = phase.manual_review
		? `${YELLOW}!${RESET}`
		: `${GREEN}✓${RESET}`
	const mode = phase.parallel ? "parallel" : "sequential"
	const lines = [
		`  ${marker} ${phase.name} (${mode}, ${formatMinutes(phase.estimated_minutes)}): ${phase.containers.join(", ")}`,
		`    ${phase.description}`,
	]
	for (const cycle of phase.cycles ?? []) {
		lines.push(`    cycle: ${[...cycle, cycle[0]].join(" -> ")}`)
	}
	return lines.join("\n")
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
	const marker = diagnostic.severity === "warning" ? `${YELLOW}!${RESET}` : "-"
	return `  ${marker} [${diagnostic.code}] ${diagnostic.message}`
}

/**
 * Format a migration report summary
 */
export function formatPlanSummary(report: MigrationReport): string {
	const lines: string[] = []
	const graph = report.dependency_graph
	const sequence = report.migration_sequence
	const duration = sequence.estimated_duration

	lines.push(`Containers: ${graph.nodes.length}`)
	lines.push(`Edges: ${graph.edges.length}`)

	// Group edges by type
	const byType = new Map<string, number>()
	for (const edge of graph.edges) {
		byType.set(edge.type, (byType.get(edge.type) ?? 0) + 1)
	}
	for (const [type, count] of byType.entries()) {
		lines.push(`  ${type}: ${count}`)
	}

	if (graph.cycles.length > 0) {
		lines.push("")
		lines.push(`${YELLOW}Cycles: ${graph.cycles.length}${RESET}`)
		for (const cycle of graph.cycles) {
			lines.push(`  ${[...cycle, cycle[0]].join(" -> ")}`)
		}
		if (graph.cycle_enumeration_truncated) {
			lines.push("  (enumeration truncated, more cycles may exist)")
		}
	}

	lines.push("")
	lines.push(`Phases: ${sequence.total_phases}`)
	for (const phase of sequence.phases) {
		lines.push(formatPhase(phase))
	}

	lines.push("")
	lines.push("Estimated duration:")
	lines.push(`  Sequential: ${formatMinutes(duration.estimated_sequential_minutes)}`)
	lines.push(`  Parallel: ${formatMinutes(duration.estimated_parallel_minutes)}`)
	lines.push(`  Time savings: ${duration.time_savings_percent}%`)

	if (report.diagnostics.length > 0) {
		lines.push("")
		lines.push(`Diagnostics: ${report.diagnostics.length}`)
		for (const diagnostic of report.diagnostics) {
			lines.push(formatDiagnostic(diagnostic))
		}
	}

	return lines.join("\n")
}

/**
 * One-line failure message for a command action
 */
export function formatError(error: unknown): string {
	return `${RED}✗${RESET} ${error instanceof Error ? error.message : String(error)}`
}

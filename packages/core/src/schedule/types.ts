import type { Cycle } from "../graph/cycles"

/** One schedulable unit of the condensation graph */
export type ScheduleUnit =
	| { kind: "container"; id: string }
	| { kind: "cluster"; id: string; members: string[] }

export interface MigrationPhase {
	/** Zero-based position in the migration order */
	index: number
	name: string
	/** Dependency level the phase was scheduled at */
	level: number
	containers: string[]
	/** Members can migrate at the same time */
	parallel: boolean
	/** Set on cyclic clusters, which need a person to decide the order */
	manualReview: boolean
	description: string
	cycles?: Cycle[]
}

export interface ParallelGroup {
	phase: number
	containers: string[]
	reason: string
}

export interface PhaseEstimate {
	phase: number
	minutes: number
}

export interface DurationEstimate {
	totalContainers: number
	/** Minutes per container after the complexity multiplier */
	perContainer: Record<string, number>
	perPhase: PhaseEstimate[]
	sequentialMinutes: number
	parallelMinutes: number
	sequentialHours: number
	parallelHours: number
	timeSavingsPercent: number
}

export interface MigrationSequence {
	phases: MigrationPhase[]
	parallelGroups: ParallelGroup[]
	sequentialOrder: string[]
	estimate: DurationEstimate
}

export type PodplanErrorCode = "invalid_snapshot" | "invalid_config"

export class PodplanError extends Error {
	constructor(
		message: string,
		public readonly code: PodplanErrorCode,
	) {
		super(message)
		this.name = "PodplanError"
	}
}

/**
 * The inventory cannot produce a meaningful graph (no containers, duplicate
 * ids, wrong top-level shape). Always fatal.
 */
export class InvalidSnapshotError extends PodplanError {
	constructor(
		message: string,
		public readonly issues: string[] = [],
	) {
		super(message, "invalid_snapshot")
		this.name = "InvalidSnapshotError"
	}
}

export class ConfigError extends PodplanError {
	constructor(message: string) {
		super(message, "invalid_config")
		this.name = "ConfigError"
	}
}

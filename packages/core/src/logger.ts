export interface Logger {
	debug(message: string): void
	info(message: string): void
	warn(message: string): void
}

/**
 * Console-backed logger. Debug lines only show with `verbose`.
 */
export function createConsoleLogger(options?: { verbose?: boolean }): Logger {
	const verbose = options?.verbose ?? false
	return {
		debug(message) {
			if (verbose) console.log(`  ${message}`)
		},
		info(message) {
			console.log(message)
		},
		warn(message) {
			console.warn(`Warning: ${message}`)
		},
	}
}

export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
}

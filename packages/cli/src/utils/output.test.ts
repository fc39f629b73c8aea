import type { MigrationReport } from "@podplan/core"
import { describe, expect, test } from "vitest"
import { formatError, formatMinutes, formatPhase } from "./output"

describe("formatMinutes", () => {
	test("formats minutes and hours", () => {
		expect(formatMinutes(5)).toBe("5m")
		expect(formatMinutes(7.5)).toBe("7.5m")
		expect(formatMinutes(60)).toBe("1h")
		expect(formatMinutes(90)).toBe("1h 30m")
	})
})

describe("formatPhase", () => {
	test("lists cycles of a manual review phase", () => {
		const phase: MigrationReport["migration_sequence"]["phases"][number] = {
			name: "Phase 1",
			containers: ["a", "b"],
			parallel: false,
			description: "Circular dependency between a, b",
			manual_review: true,
			estimated_minutes: 10,
			cycles: [["a", "b"]],
		}

		expect(formatPhase(phase).split("\n")).toEqual([
			"  \x1b[33m!\x1b[0m Phase 1 (sequential, 10m): a, b",
			"    Circular dependency between a, b",
			"    cycle: a -> b -> a",
		])
	})
})

describe("formatError", () => {
	test("prints the message after a red cross", () => {
		expect(formatError(new Error("Invalid configuration at minutesPerContainer: Expected number"))).toBe(
			"\x1b[31m✗\x1b[0m Invalid configuration at minutesPerContainer: Expected number",
		)
		expect(formatError("stopped")).toBe("\x1b[31m✗\x1b[0m stopped")
	})
})

import { describe, expect, test } from "vitest"
import { stronglyConnectedComponents } from "./components"

describe("stronglyConnectedComponents", () => {
	test("groups mutually reachable nodes", () => {
		const adjacency = new Map<string, string[]>([
			["a", ["b"]],
			["b", ["c"]],
			["c", ["a"]],
			["d", ["a"]],
		])

		expect(stronglyConnectedComponents(adjacency)).toEqual([["a", "b", "c"], ["d"]])
	})

	test("keeps every node of a chain in its own component", () => {
		const adjacency = new Map<string, string[]>([
			["x", ["y"]],
			["y", ["z"]],
			["z", []],
		])

		expect(stronglyConnectedComponents(adjacency)).toEqual([["x"], ["y"], ["z"]])
	})
})

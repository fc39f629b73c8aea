import { InvalidArgumentError } from "commander"

export function parsePositiveNumber(value: string): number {
	const parsed = Number(value)
	if (Number.isNaN(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Expected a positive number.")
	}
	return parsed
}

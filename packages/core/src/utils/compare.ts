/**
 * Code-point string ordering, identical on every platform and locale
 */
export function compareStrings(a: string, b: string): number {
	if (a < b) return -1
	if (a > b) return 1
	return 0
}

export function sortedUnique(values: Iterable<string>): string[] {
	return [...new Set(values)].sort(compareStrings)
}

export interface AgeRange {
	min: number
	max: number
}

export const AGE_BUCKET_WIDTH = 10
export const DEFAULT_MIN_AGE = 0
export const DEFAULT_MAX_AGE = 100

const WHOLE_NUMBER = /^\d+$/
// Largest value an INTEGER column can compare against.
export const MAX_AGE_BOUND = 2147483647

/**
 * Parses a `start-end` token (both ends inclusive). Returns null for anything
 * that is not two non-negative integers in ascending order, or that has a
 * bound beyond MAX_AGE_BOUND.
 */
export function parseAgeRange(token: string): AgeRange | null {
	const sep = token.indexOf('-')
	if (sep === -1) return null

	const start = token.slice(0, sep).trim()
	const end = token.slice(sep + 1).trim()
	if (!WHOLE_NUMBER.test(start) || !WHOLE_NUMBER.test(end)) return null

	const min = Number(start)
	const max = Number(end)
	if (max > MAX_AGE_BOUND || min > max) return null

	return { min, max }
}

export function parseAgeRanges(tokens: readonly string[]): AgeRange[] {
	const ranges: AgeRange[] = []
	for (const token of tokens) {
		const range = parseAgeRange(token)
		if (range) ranges.push(range)
	}
	return ranges
}

export function formatAgeRange(range: AgeRange): string {
	return `${range.min}-${range.max}`
}

/**
 * 10-year buckets from the youngest observed age up to (excluding) the
 * oldest. Missing bounds fall back to 0 and 100, and buckets never start
 * below 0 since a negative token cannot be parsed back.
 */
export function buildAgeBuckets(
	minAge: number | null,
	maxAge: number | null,
): string[] {
	const low = Math.max(0, minAge ?? DEFAULT_MIN_AGE)
	const high = maxAge ?? DEFAULT_MAX_AGE

	const buckets: string[] = []
	for (let start = low; start < high; start += AGE_BUCKET_WIDTH) {
		buckets.push(
			formatAgeRange({ min: start, max: start + AGE_BUCKET_WIDTH - 1 }),
		)
	}
	return buckets
}

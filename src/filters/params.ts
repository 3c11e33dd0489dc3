import { z } from 'zod'

import { RequestValidationError } from '../errors'
import { parseAgeRanges } from './ageRanges'
import type { FilterSelection, ListOptions } from './types'

export const DEFAULT_SORT_FIELD = 'customer_name'
export const DEFAULT_PAGE_SIZE = 50

// Repeated keys (`?genders=a&genders=b`) arrive as arrays, single ones as
// strings. Nested objects from bracket syntax carry no usable value.
function toList(value: unknown): string[] {
	const items = Array.isArray(value) ? value : [value]
	return items.filter(
		(item): item is string => typeof item === 'string' && item !== '',
	)
}

// A scalar sent more than once takes its last value; blanks count as absent.
function lastValue(value: unknown): string | undefined {
	const items = Array.isArray(value) ? value : [value]
	const last = items[items.length - 1]
	if (typeof last !== 'string') return undefined
	const trimmed = last.trim()
	return trimmed === '' ? undefined : trimmed
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

function isCalendarDate(value: string): boolean {
	if (!ISO_DATE.test(value)) return false
	const parsed = new Date(`${value}T00:00:00Z`)
	return (
		!Number.isNaN(parsed.getTime()) &&
		parsed.toISOString().slice(0, 10) === value
	)
}

const stringList = z.preprocess(toList, z.array(z.string()))

const isoDate = z.preprocess(
	lastValue,
	z
		.string()
		.refine(isCalendarDate, 'must be a date in YYYY-MM-DD format')
		.optional(),
)

const optionalText = z.preprocess(lastValue, z.string().optional())

function wholeNumber(fallback: number) {
	return z.preprocess(
		lastValue,
		z.coerce
			.number()
			.int('must be an integer')
			.max(Number.MAX_SAFE_INTEGER, 'must be a safe integer')
			.default(fallback),
	)
}

const filterSchema = z.object({
	customer_regions: stringList,
	genders: stringList,
	age_ranges: stringList,
	product_categories: stringList,
	tags: stringList,
	payment_methods: stringList,
	start_date: isoDate,
	end_date: isoDate,
	search: optionalText,
})

const listingSchema = filterSchema.extend({
	sort_by: optionalText,
	sort_order: optionalText,
	limit: wholeNumber(DEFAULT_PAGE_SIZE),
	offset: wholeNumber(0),
})

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
		.join('; ')
}

function toSelection(parsed: z.infer<typeof filterSchema>): FilterSelection {
	return {
		customerRegions: parsed.customer_regions,
		genders: parsed.genders,
		ageRanges: parseAgeRanges(parsed.age_ranges),
		productCategories: parsed.product_categories,
		tags: parsed.tags,
		paymentMethods: parsed.payment_methods,
		startDate: parsed.start_date,
		endDate: parsed.end_date,
		search: parsed.search,
	}
}

export function parseFilterSelection(query: unknown): FilterSelection {
	const result = filterSchema.safeParse(query)
	if (!result.success) {
		throw new RequestValidationError(describeIssues(result.error))
	}
	return toSelection(result.data)
}

export function parseListingQuery(query: unknown): {
	selection: FilterSelection
	options: ListOptions
} {
	const result = listingSchema.safeParse(query)
	if (!result.success) {
		throw new RequestValidationError(describeIssues(result.error))
	}

	const { sort_by, sort_order, limit, offset, ...filters } = result.data
	return {
		selection: toSelection(filters),
		options: {
			sortBy: sort_by ?? DEFAULT_SORT_FIELD,
			sortOrder: sort_order?.toLowerCase() === 'desc' ? 'desc' : 'asc',
			limit,
			offset,
		},
	}
}

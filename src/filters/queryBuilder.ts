import type { SqlValue } from '../db/pool'
import type { AgeRange } from './ageRanges'
import type { FilterSelection } from './types'

export interface FilterClause {
	/** `''` when nothing is filtered, otherwise `WHERE ...` */
	where: string
	/** Bound in order to `$1..$n`. */
	values: SqlValue[]
}

class ClauseCollector {
	readonly clauses: string[] = []
	readonly values: SqlValue[] = []

	bind(value: SqlValue): string {
		this.values.push(value)
		return `$${this.values.length}`
	}

	add(clause: string): void {
		this.clauses.push(clause)
	}
}

function inSet(c: ClauseCollector, column: string, values: string[]): void {
	if (values.length === 0) return
	c.add(`${column} = ANY(${c.bind([...values])}::text[])`)
}

function ageInRanges(c: ClauseCollector, ranges: AgeRange[]): void {
	if (ranges.length === 0) return
	const parts = ranges.map(
		(r) => `age BETWEEN ${c.bind(r.min)} AND ${c.bind(r.max)}`,
	)
	c.add(`(${parts.join(' OR ')})`)
}

// Matching is on whole array elements: a requested tag never matches a
// longer tag that contains it. Values that are not brace-delimited hold no
// tags, mirroring decodeTags, and are never cast.
const STORED_TAGS = `(CASE WHEN tags LIKE '{%}' THEN tags::text[] END)`

function tagsMatch(c: ClauseCollector, tags: string[]): void {
	if (tags.length === 0) return
	const parts = tags.map((tag) => `${c.bind(tag)} = ANY${STORED_TAGS}`)
	c.add(`(${parts.join(' OR ')})`)
}

function searchMatch(c: ClauseCollector, search: string | undefined): void {
	const term = search?.trim()
	if (!term) return
	const p = c.bind(term)
	c.add(`(LOWER(customer_name) = LOWER(${p}) OR phone_number = ${p})`)
}

/**
 * Turns a selection into one WHERE clause. Listing and statistics both call
 * this, so the totals always describe the same rows as the table.
 */
export function buildFilterClause(selection: FilterSelection): FilterClause {
	const c = new ClauseCollector()

	inSet(c, 'customer_region', selection.customerRegions)
	inSet(c, 'gender', selection.genders)
	ageInRanges(c, selection.ageRanges)
	inSet(c, 'product_category', selection.productCategories)
	tagsMatch(c, selection.tags)
	inSet(c, 'payment_method', selection.paymentMethods)

	if (selection.startDate) {
		c.add(`date >= ${c.bind(selection.startDate)}::date`)
	}
	if (selection.endDate) {
		c.add(`date <= ${c.bind(selection.endDate)}::date`)
	}

	searchMatch(c, selection.search)

	return {
		where: c.clauses.length > 0 ? `WHERE ${c.clauses.join(' AND ')}` : '',
		values: c.values,
	}
}

/** Joins SQL fragments with single spaces, skipping empty ones. */
export function joinSql(...parts: string[]): string {
	return parts.filter((p) => p.length > 0).join(' ')
}

import type { AgeRange } from './ageRanges'

/**
 * Constraints for one request. Values inside a dimension are OR'ed, the
 * dimensions themselves are AND'ed, and an empty dimension matches every row.
 */
export interface FilterSelection {
	customerRegions: string[]
	genders: string[]
	ageRanges: AgeRange[]
	productCategories: string[]
	tags: string[]
	paymentMethods: string[]
	/** `YYYY-MM-DD`, inclusive */
	startDate?: string
	/** `YYYY-MM-DD`, inclusive */
	endDate?: string
	/** Exact customer name (any case) or exact phone number. */
	search?: string
}

export function emptySelection(): FilterSelection {
	return {
		customerRegions: [],
		genders: [],
		ageRanges: [],
		productCategories: [],
		tags: [],
		paymentMethods: [],
	}
}

export type SortOrder = 'asc' | 'desc'

export interface ListOptions {
	sortBy?: string
	sortOrder: SortOrder
	limit: number
	offset: number
}

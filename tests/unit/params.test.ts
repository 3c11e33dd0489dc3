import { describe, expect, it } from '@jest/globals'

import { RequestValidationError } from '../../src/errors'
import {
	parseFilterSelection,
	parseListingQuery,
} from '../../src/filters/params'
import { emptySelection } from '../../src/filters/types'

describe('parseFilterSelection', () => {
	it('treats a bare query as no constraint', () => {
		expect(parseFilterSelection({})).toEqual(emptySelection())
	})

	it('accepts repeated and single multi-select values', () => {
		const selection = parseFilterSelection({
			genders: ['Male', 'Female'],
			customer_regions: 'North',
			age_ranges: ['0-9', 'oops', '20-29'],
		})

		expect(selection.genders).toEqual(['Male', 'Female'])
		expect(selection.customerRegions).toEqual(['North'])
		expect(selection.ageRanges).toEqual([
			{ min: 0, max: 9 },
			{ min: 20, max: 29 },
		])
	})

	it('drops empty values from multi-selects', () => {
		expect(parseFilterSelection({ tags: ['', 'sale'] }).tags).toEqual(['sale'])
		expect(parseFilterSelection({ tags: '' }).tags).toEqual([])
	})

	it('treats a blank date as absent', () => {
		expect(parseFilterSelection({ start_date: '' }).startDate).toBeUndefined()
	})

	it('keeps valid dates and the search term', () => {
		const selection = parseFilterSelection({
			start_date: '2023-01-01',
			end_date: '2023-06-30',
			search: 'Jane Doe',
		})

		expect(selection.startDate).toBe('2023-01-01')
		expect(selection.endDate).toBe('2023-06-30')
		expect(selection.search).toBe('Jane Doe')
	})

	it('rejects dates that are not YYYY-MM-DD', () => {
		expect(() => parseFilterSelection({ start_date: 'yesterday' })).toThrow(
			'start_date: must be a date in YYYY-MM-DD format',
		)
	})

	it('rejects impossible calendar dates', () => {
		expect(() => parseFilterSelection({ end_date: '2023-02-30' })).toThrow(
			'end_date: must be a date in YYYY-MM-DD format',
		)
	})
})

describe('parseListingQuery', () => {
	it('applies listing defaults', () => {
		expect(parseListingQuery({}).options).toEqual({
			sortBy: 'customer_name',
			sortOrder: 'asc',
			limit: 50,
			offset: 0,
		})
	})

	it('reads sort and paging parameters', () => {
		expect(
			parseListingQuery({
				sort_by: 'age',
				sort_order: 'DESC',
				limit: '5',
				offset: '20',
			}).options,
		).toEqual({ sortBy: 'age', sortOrder: 'desc', limit: 5, offset: 20 })
	})

	it('sorts ascending for any order other than desc', () => {
		expect(parseListingQuery({ sort_order: 'sideways' }).options.sortOrder).toBe(
			'asc',
		)
	})

	it('rejects a non-numeric limit with a 422', () => {
		let caught: unknown
		try {
			parseListingQuery({ limit: 'ten' })
		} catch (err) {
			caught = err
		}

		expect(caught).toBeInstanceOf(RequestValidationError)
		expect(caught).toMatchObject({
			status: 422,
			message: expect.stringMatching(/^limit: /),
		})
	})

	it('rejects a fractional offset', () => {
		expect(() => parseListingQuery({ offset: '2.5' })).toThrow(
			'offset: must be an integer',
		)
	})

	it('rejects an offset beyond the safe integer range', () => {
		expect(() =>
			parseListingQuery({ offset: '100000000000000000000' }),
		).toThrow('offset: must be a safe integer')
	})

	it('skips age ranges with bounds an INTEGER column cannot hold', () => {
		const { selection } = parseListingQuery({
			age_ranges: ['0-99999999999999999999999', '0-3000000000', '20-29'],
		})

		expect(selection.ageRanges).toEqual([{ min: 20, max: 29 }])
	})
})

import { describe, expect, it } from '@jest/globals'

import { buildFilterClause, joinSql } from '../../src/filters/queryBuilder'
import { emptySelection } from '../../src/filters/types'

describe('buildFilterClause', () => {
	it('emits no WHERE for an empty selection', () => {
		expect(buildFilterClause(emptySelection())).toEqual({
			where: '',
			values: [],
		})
	})

	it('matches a multi-select dimension against the whole set', () => {
		const clause = buildFilterClause({
			...emptySelection(),
			customerRegions: ['North', 'South'],
		})

		expect(clause.where).toBe('WHERE customer_region = ANY($1::text[])')
		expect(clause.values).toEqual([['North', 'South']])
	})

	it('ORs age ranges with inclusive bounds', () => {
		const clause = buildFilterClause({
			...emptySelection(),
			ageRanges: [
				{ min: 0, max: 9 },
				{ min: 20, max: 29 },
			],
		})

		expect(clause.where).toBe(
			'WHERE (age BETWEEN $1 AND $2 OR age BETWEEN $3 AND $4)',
		)
		expect(clause.values).toEqual([0, 9, 20, 29])
	})

	it('matches tags as whole array elements', () => {
		const clause = buildFilterClause({
			...emptySelection(),
			tags: ['sale', 'new'],
		})

		expect(clause.where).toBe(
			"WHERE ($1 = ANY(CASE WHEN tags LIKE '{%}' THEN tags::text[] END) OR $2 = ANY(CASE WHEN tags LIKE '{%}' THEN tags::text[] END))",
		)
		expect(clause.values).toEqual(['sale', 'new'])
	})

	it('trims the search term and compares names case-insensitively', () => {
		const clause = buildFilterClause({
			...emptySelection(),
			search: '  john smith ',
		})

		expect(clause.where).toBe(
			'WHERE (LOWER(customer_name) = LOWER($1) OR phone_number = $1)',
		)
		expect(clause.values).toEqual(['john smith'])
	})

	it('omits a blank search', () => {
		expect(
			buildFilterClause({ ...emptySelection(), search: '   ' }).where,
		).toBe('')
	})

	it('bounds dates independently', () => {
		expect(
			buildFilterClause({ ...emptySelection(), endDate: '2023-12-31' }),
		).toEqual({ where: 'WHERE date <= $1::date', values: ['2023-12-31'] })
	})

	it('ANDs every dimension in a fixed order', () => {
		const clause = buildFilterClause({
			customerRegions: ['North'],
			genders: ['Female', 'Male'],
			ageRanges: [
				{ min: 0, max: 9 },
				{ min: 20, max: 29 },
			],
			productCategories: ['Books'],
			tags: ['sale'],
			paymentMethods: ['Cash'],
			startDate: '2023-01-01',
			endDate: '2023-12-31',
			search: 'John Smith',
		})

		expect(clause.where).toBe(
			[
				'WHERE customer_region = ANY($1::text[])',
				'gender = ANY($2::text[])',
				'(age BETWEEN $3 AND $4 OR age BETWEEN $5 AND $6)',
				'product_category = ANY($7::text[])',
				"($8 = ANY(CASE WHEN tags LIKE '{%}' THEN tags::text[] END))",
				'payment_method = ANY($9::text[])',
				'date >= $10::date',
				'date <= $11::date',
				'(LOWER(customer_name) = LOWER($12) OR phone_number = $12)',
			].join(' AND '),
		)
		expect(clause.values).toEqual([
			['North'],
			['Female', 'Male'],
			0,
			9,
			20,
			29,
			['Books'],
			'sale',
			['Cash'],
			'2023-01-01',
			'2023-12-31',
			'John Smith',
		])
	})

	it('does not share arrays with the selection', () => {
		const selection = { ...emptySelection(), genders: ['Male'] }
		const clause = buildFilterClause(selection)
		selection.genders.push('Female')

		expect(clause.values).toEqual([['Male']])
	})
})

describe('joinSql', () => {
	it('skips empty fragments', () => {
		expect(joinSql('SELECT 1', '', 'LIMIT 1')).toBe('SELECT 1 LIMIT 1')
	})
})

import type { Db, DbProvider } from '../db/pool'
import { TABLE_NAME } from '../db/migrate'
import { buildAgeBuckets } from '../filters/ageRanges'
import { decodeTags } from '../filters/tagCodec'
import { asInteger, asText } from '../types/transaction'

export interface FilterOptions {
	customer_regions: string[]
	genders: string[]
	age_ranges: string[]
	product_categories: string[]
	tags: string[]
	payment_methods: string[]
}

function sortedUnique(values: Iterable<string>): string[] {
	return [...new Set(values)].sort()
}

async function distinctValues(db: Db, column: string): Promise<string[]> {
	const rows = await db.query(
		`SELECT DISTINCT ${column} AS value FROM ${TABLE_NAME} WHERE ${column} IS NOT NULL AND ${column} <> ''`,
	)
	const values: string[] = []
	for (const row of rows) {
		const value = asText(row.value)
		if (value) values.push(value)
	}
	return sortedUnique(values)
}

async function distinctTags(db: Db): Promise<string[]> {
	const rows = await db.query(
		`SELECT DISTINCT tags AS value FROM ${TABLE_NAME} WHERE tags IS NOT NULL AND tags NOT IN ('', '{}')`,
	)
	const tags: string[] = []
	for (const row of rows) {
		for (const tag of decodeTags(asText(row.value))) {
			if (tag !== '') tags.push(tag)
		}
	}
	return sortedUnique(tags)
}

async function ageBuckets(db: Db): Promise<string[]> {
	const [row] = await db.query(
		`SELECT MIN(age) AS min_age, MAX(age) AS max_age FROM ${TABLE_NAME}`,
	)
	return buildAgeBuckets(asInteger(row?.min_age), asInteger(row?.max_age))
}

/**
 * Choices for the filter dropdowns. Always computed over the whole table, so
 * the lists do not shrink as the user narrows the selection.
 */
export class FilterOptionsService {
	constructor(private readonly db: DbProvider) {}

	async getOptions(): Promise<FilterOptions> {
		return this.db.withConnection(async (db) => {
			const customerRegions = await distinctValues(db, 'customer_region')
			const genders = await distinctValues(db, 'gender')
			const productCategories = await distinctValues(db, 'product_category')
			const paymentMethods = await distinctValues(db, 'payment_method')
			const tags = await distinctTags(db)
			const ageRanges = await ageBuckets(db)

			return {
				customer_regions: customerRegions,
				genders,
				age_ranges: ageRanges,
				product_categories: productCategories,
				tags,
				payment_methods: paymentMethods,
			}
		})
	}
}

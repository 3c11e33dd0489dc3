import type { DbProvider } from '../db/pool'
import { TABLE_NAME } from '../db/migrate'
import { buildFilterClause, joinSql } from '../filters/queryBuilder'
import type { FilterSelection } from '../filters/types'
import { asAmount, asInteger } from '../types/transaction'

export interface Statistics {
	total_units: number
	total_amount: number
	total_discount: number
	total_transactions: number
}

const AGGREGATES = [
	'COALESCE(SUM(quantity), 0) AS total_units',
	'COALESCE(SUM(total_amount), 0) AS total_amount',
	'COALESCE(SUM(discount), 0) AS total_discount',
	'COUNT(*) AS total_transactions',
].join(', ')

export class StatisticsService {
	constructor(private readonly db: DbProvider) {}

	async summarize(selection: FilterSelection): Promise<Statistics> {
		const clause = buildFilterClause(selection)

		const [row] = await this.db.withConnection((db) =>
			db.query(
				joinSql(`SELECT ${AGGREGATES}`, `FROM ${TABLE_NAME}`, clause.where),
				clause.values,
			),
		)

		// SUM over integers and COUNT come back from pg as bigint strings
		return {
			total_units: asInteger(row?.total_units) ?? 0,
			total_amount: asAmount(row?.total_amount),
			total_discount: asAmount(row?.total_discount),
			total_transactions: asInteger(row?.total_transactions) ?? 0,
		}
	}
}

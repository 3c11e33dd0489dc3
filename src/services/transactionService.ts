import type { DbProvider } from '../db/pool'
import { TABLE_NAME } from '../db/migrate'
import { buildFilterClause, joinSql } from '../filters/queryBuilder'
import type { FilterSelection, ListOptions, SortOrder } from '../filters/types'
import {
	TRANSACTION_COLUMNS,
	type TransactionColumn,
	type TransactionPage,
	asInteger,
	toTransactionDto,
} from '../types/transaction'

export const MIN_PAGE_SIZE = 10
export const MAX_PAGE_SIZE = 200

// Only these names ever reach ORDER BY; every other value is dropped.
const SORT_COLUMNS: Readonly<Record<string, TransactionColumn>> =
	Object.freeze(
		Object.fromEntries(
			TRANSACTION_COLUMNS.filter((c) => c !== 'tags').map(
				(c): [string, TransactionColumn] => [c, c],
			),
		),
	)

export function clampLimit(limit: number): number {
	return Math.max(MIN_PAGE_SIZE, Math.min(limit, MAX_PAGE_SIZE))
}

export function resolveSortColumn(
	sortBy: string | undefined,
): TransactionColumn | null {
	if (sortBy === undefined || !Object.hasOwn(SORT_COLUMNS, sortBy)) return null
	return SORT_COLUMNS[sortBy]
}

/** `''` when the field is not sortable. */
export function buildOrderBy(
	sortBy: string | undefined,
	sortOrder: SortOrder,
): string {
	const column = resolveSortColumn(sortBy)
	if (!column) return ''

	const direction = sortOrder === 'desc' ? 'DESC' : 'ASC'
	if (column === 'transaction_id') {
		return `ORDER BY transaction_id ${direction}`
	}
	return `ORDER BY ${column} ${direction}, transaction_id ${direction}`
}

export class TransactionService {
	constructor(private readonly db: DbProvider) {}

	async list(
		selection: FilterSelection,
		options: ListOptions,
	): Promise<TransactionPage> {
		const clause = buildFilterClause(selection)
		const limit = clampLimit(options.limit)
		const offset = Math.max(0, options.offset)

		return this.db.withConnection(async (db) => {
			const [countRow] = await db.query(
				joinSql('SELECT COUNT(*) AS total', `FROM ${TABLE_NAME}`, clause.where),
				clause.values,
			)

			const n = clause.values.length
			const rows = await db.query(
				joinSql(
					`SELECT ${TRANSACTION_COLUMNS.join(', ')}`,
					`FROM ${TABLE_NAME}`,
					clause.where,
					buildOrderBy(options.sortBy, options.sortOrder),
					`LIMIT $${n + 1} OFFSET $${n + 2}`,
				),
				[...clause.values, limit, offset],
			)

			return {
				total: asInteger(countRow?.total) ?? 0,
				limit,
				offset,
				data: rows.map(toTransactionDto),
			}
		})
	}
}

import { Pool, types } from 'pg'

/** OID of the PostgreSQL `date` type. */
const PG_DATE_OID = 1082

// Keep calendar dates as the `YYYY-MM-DD` text the server sends, so no
// local-timezone shift happens on the way to the client.
types.setTypeParser(PG_DATE_OID, (value: string) => value)

export type SqlValue = string | number | boolean | null | string[]

/** Rows come back untyped; callers coerce each column they read. */
export type DbRow = Record<string, unknown>

export interface Db {
	query(text: string, values?: readonly SqlValue[]): Promise<DbRow[]>
}

/**
 * Hands out one scoped connection per unit of work and always gives it back,
 * whether the work resolves or throws.
 */
export interface DbProvider {
	withConnection<T>(work: (db: Db) => Promise<T>): Promise<T>
}

export function createPool(connectionString: string, max: number): Pool {
	const pool = new Pool({
		connectionString,
		max,
		idleTimeoutMillis: 30000,
	})

	pool.on('error', (err) => {
		console.error('[db] idle client error', { error: err.message })
	})

	return pool
}

/** The slice of `pg.Pool` the provider relies on. */
export interface PoolLike {
	connect(): Promise<{
		query(text: string, values: SqlValue[]): Promise<{ rows: DbRow[] }>
		release(): void
	}>
}

export function createPgProvider(pool: PoolLike): DbProvider {
	return {
		async withConnection<T>(work: (db: Db) => Promise<T>): Promise<T> {
			const client = await pool.connect()
			try {
				return await work({
					async query(
						text: string,
						values: readonly SqlValue[] = [],
					): Promise<DbRow[]> {
						const res = await client.query(text, [...values])
						return res.rows
					},
				})
			} finally {
				client.release()
			}
		},
	}
}

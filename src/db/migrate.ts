export const TABLE_NAME = 'sales_transactions'

export const CREATE_TABLE = `
	CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
		transaction_id TEXT PRIMARY KEY,
		date DATE,
		customer_id TEXT,
		customer_name TEXT,
		phone_number TEXT,
		gender TEXT,
		age INTEGER,
		customer_region TEXT,
		product_category TEXT,
		quantity INTEGER,
		price_per_unit DOUBLE PRECISION,
		total_amount DOUBLE PRECISION,
		discount DOUBLE PRECISION,
		payment_method TEXT,
		tags TEXT
	)
`

export const INDEX_STATEMENTS: readonly string[] = [
	`CREATE INDEX IF NOT EXISTS idx_sales_customer_region ON ${TABLE_NAME}(customer_region)`,
	`CREATE INDEX IF NOT EXISTS idx_sales_gender ON ${TABLE_NAME}(gender)`,
	`CREATE INDEX IF NOT EXISTS idx_sales_age ON ${TABLE_NAME}(age)`,
	`CREATE INDEX IF NOT EXISTS idx_sales_product_category ON ${TABLE_NAME}(product_category)`,
	`CREATE INDEX IF NOT EXISTS idx_sales_payment_method ON ${TABLE_NAME}(payment_method)`,
	`CREATE INDEX IF NOT EXISTS idx_sales_date ON ${TABLE_NAME}(date)`,
	// search compares LOWER(customer_name), so index the expression
	`CREATE INDEX IF NOT EXISTS idx_sales_customer_name_lower ON ${TABLE_NAME}(LOWER(customer_name))`,
	`CREATE INDEX IF NOT EXISTS idx_sales_phone_number ON ${TABLE_NAME}(phone_number)`,
]

export interface MigrationClient {
	query(text: string): Promise<unknown>
	release(): void
}

/** Anything that can lend a client, a `pg.Pool` included. */
export interface MigrationTarget {
	connect(): Promise<MigrationClient>
}

/**
 * Creates the transactions table and its filter indexes if they are missing.
 * Safe to run on every startup.
 */
export async function migrate(pool: MigrationTarget): Promise<void> {
	const client = await pool.connect()
	try {
		await client.query('BEGIN')
		await client.query(CREATE_TABLE)
		for (const stmt of INDEX_STATEMENTS) {
			await client.query(stmt)
		}
		await client.query('COMMIT')
		console.log('[db] schema is up to date')
	} catch (error) {
		await client.query('ROLLBACK')
		console.error('[db] migration failed', error)
		throw error
	} finally {
		client.release()
	}
}

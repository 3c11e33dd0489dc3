import type { DbRow } from '../../src/db/pool'

export function transactionRow(overrides: DbRow = {}): DbRow {
	return {
		transaction_id: 'T-1',
		date: '2023-03-14',
		customer_id: 'C-1',
		customer_name: 'Jane Doe',
		phone_number: '5550100',
		gender: 'Female',
		age: 34,
		customer_region: 'North',
		product_category: 'Electronics',
		quantity: 2,
		price_per_unit: 150.5,
		total_amount: 301,
		discount: 10.25,
		payment_method: 'Card',
		tags: '{electronics,"home goods"}',
		...overrides,
	}
}

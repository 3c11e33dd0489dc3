import type { DbRow } from '../db/pool'
import { decodeTags } from '../filters/tagCodec'

export const TRANSACTION_COLUMNS = [
	'transaction_id',
	'date',
	'customer_id',
	'customer_name',
	'phone_number',
	'gender',
	'age',
	'customer_region',
	'product_category',
	'quantity',
	'price_per_unit',
	'total_amount',
	'discount',
	'payment_method',
	'tags',
] as const

export type TransactionColumn = (typeof TRANSACTION_COLUMNS)[number]

/** A transaction as the API returns it. */
export interface TransactionDto {
	transaction_id: string
	date: string | null
	customer_id: string | null
	customer_name: string | null
	phone_number: string | null
	gender: string | null
	age: number | null
	customer_region: string | null
	product_category: string | null
	quantity: number | null
	price_per_unit: number
	total_amount: number
	discount: number
	payment_method: string | null
	tags: string[]
}

export interface TransactionPage {
	total: number
	limit: number
	offset: number
	data: TransactionDto[]
}

export function asText(value: unknown): string | null {
	if (value === null || value === undefined) return null
	return typeof value === 'string' ? value : String(value)
}

export function asInteger(value: unknown): number | null {
	if (value === null || value === undefined) return null
	const n = Number(value)
	return Number.isFinite(n) ? Math.trunc(n) : null
}

/** Money columns read as 0 when null. */
export function asAmount(value: unknown): number {
	if (value === null || value === undefined) return 0
	const n = Number(value)
	return Number.isFinite(n) ? n : 0
}

function asIsoDate(value: unknown): string | null {
	if (value instanceof Date) return value.toISOString().slice(0, 10)
	return asText(value)
}

export function toTransactionDto(row: DbRow): TransactionDto {
	return {
		transaction_id: asText(row.transaction_id) ?? '',
		date: asIsoDate(row.date),
		customer_id: asText(row.customer_id),
		customer_name: asText(row.customer_name),
		phone_number: asText(row.phone_number),
		gender: asText(row.gender),
		age: asInteger(row.age),
		customer_region: asText(row.customer_region),
		product_category: asText(row.product_category),
		quantity: asInteger(row.quantity),
		price_per_unit: asAmount(row.price_per_unit),
		total_amount: asAmount(row.total_amount),
		discount: asAmount(row.discount),
		payment_method: asText(row.payment_method),
		tags: decodeTags(asText(row.tags)),
	}
}

import { Router } from 'express'

import { parseListingQuery } from '../filters/params'
import type { TransactionService } from '../services/transactionService'

export function createTransactionRoutes(service: TransactionService) {
	const router = Router()

	router.get('/', async (req, res, next) => {
		try {
			const { selection, options } = parseListingQuery(req.query)
			res.json(await service.list(selection, options))
		} catch (err) {
			next(err)
		}
	})

	return router
}

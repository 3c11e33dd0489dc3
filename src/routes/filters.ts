import { Router } from 'express'

import type { FilterOptionsService } from '../services/filterOptionsService'

export function createFilterRoutes(service: FilterOptionsService) {
	const router = Router()

	router.get('/options', async (_req, res, next) => {
		try {
			res.json(await service.getOptions())
		} catch (err) {
			next(err)
		}
	})

	return router
}

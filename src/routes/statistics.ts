import { Router } from 'express'

import { parseFilterSelection } from '../filters/params'
import type { StatisticsService } from '../services/statisticsService'

export function createStatisticsRoutes(service: StatisticsService) {
	const router = Router()

	router.get('/', async (req, res, next) => {
		try {
			const selection = parseFilterSelection(req.query)
			res.json(await service.summarize(selection))
		} catch (err) {
			next(err)
		}
	})

	return router
}

import cors from 'cors'
import express from 'express'

import type { DbProvider } from './db/pool'
import { errorHandler, notFound } from './middleware/errorHandler'
import { requestLogger } from './middleware/requestLogger'
import { createFilterRoutes } from './routes/filters'
import { createStatisticsRoutes } from './routes/statistics'
import { createTransactionRoutes } from './routes/transactions'
import { FilterOptionsService } from './services/filterOptionsService'
import { StatisticsService } from './services/statisticsService'
import { TransactionService } from './services/transactionService'

export interface AppOptions {
	db: DbProvider
	corsOrigins?: string[] | '*'
	/** Directory holding the dashboard front end, served at `/`. */
	staticDir?: string
	logRequests?: boolean
}

export function createApp(options: AppOptions) {
	const app = express()

	app.disable('x-powered-by')
	app.use(cors({ origin: options.corsOrigins ?? '*' }))
	if (options.logRequests) {
		app.use(requestLogger)
	}

	app.get('/health', (_req, res) => {
		res.json({ status: 'healthy' })
	})

	app.use('/api/filters', createFilterRoutes(new FilterOptionsService(options.db)))
	app.use(
		'/api/transactions',
		createTransactionRoutes(new TransactionService(options.db)),
	)
	app.use(
		'/api/statistics',
		createStatisticsRoutes(new StatisticsService(options.db)),
	)

	if (options.staticDir) {
		app.use(express.static(options.staticDir))
	}

	app.use(notFound)
	app.use(errorHandler)

	return app
}

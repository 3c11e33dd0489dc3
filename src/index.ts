import { createApp } from './app'
import { loadConfig, parseCorsOrigins } from './config'
import { migrate } from './db/migrate'
import { createPgProvider, createPool } from './db/pool'

async function main() {
	const config = loadConfig()
	const pool = createPool(config.DATABASE_URL, config.PG_POOL_MAX)

	if (config.RUN_MIGRATIONS) {
		await migrate(pool)
	}

	const app = createApp({
		db: createPgProvider(pool),
		corsOrigins: parseCorsOrigins(config.CORS_ORIGINS),
		staticDir: config.STATIC_DIR,
		logRequests: config.NODE_ENV !== 'test',
	})

	const server = app.listen(config.PORT, () => {
		console.log(`[server] listening on port ${config.PORT}`)
	})

	const shutdown = (signal: NodeJS.Signals) => {
		console.log(`[server] ${signal} received, shutting down`)
		server.close(() => {
			pool.end().then(
				() => process.exit(0),
				(err: unknown) => {
					console.error('[db] failed to close pool', err)
					process.exit(1)
				},
			)
		})
	}

	process.once('SIGINT', shutdown)
	process.once('SIGTERM', shutdown)
}

main().catch((err: unknown) => {
	console.error('[server] failed to start', err)
	process.exit(1)
})

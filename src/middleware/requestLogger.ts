import type { NextFunction, Request, Response } from 'express'

export function requestLogger(
	req: Request,
	res: Response,
	next: NextFunction,
): void {
	const start = Date.now()

	res.on('finish', () => {
		console.log(
			`[http] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - start}ms`,
		)
	})

	next()
}

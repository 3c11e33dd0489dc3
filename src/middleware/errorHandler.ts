import type { NextFunction, Request, Response } from 'express'

import { HttpError, errorMessage } from '../errors'

export function notFound(_req: Request, res: Response): void {
	res.status(404).json({ detail: 'Not Found' })
}

export function errorHandler(
	err: unknown,
	req: Request,
	res: Response,
	_next: NextFunction,
): void {
	const detail = errorMessage(err)

	if (err instanceof HttpError) {
		res.status(err.status).json({ detail })
		return
	}

	console.error(`[http] ${req.method} ${req.originalUrl} failed`, err)
	res.status(500).json({ detail })
}

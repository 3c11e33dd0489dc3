export class HttpError extends Error {
	constructor(
		readonly status: number,
		message: string,
	) {
		super(message)
		this.name = 'HttpError'
	}
}

/** A query string that could not be turned into a selection. */
export class RequestValidationError extends HttpError {
	constructor(message: string) {
		super(422, message)
		this.name = 'RequestValidationError'
	}
}

export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message
	return typeof err === 'string' ? err : 'Internal server error'
}

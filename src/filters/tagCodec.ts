// Tags are stored as a PostgreSQL array literal: {electronics,"home goods"}

// Only values of this shape count as tags; the SQL filter applies the same
// test (tags LIKE '{%}') before casting.
export function isArrayLiteral(value: string): boolean {
	return value.length >= 2 && value.startsWith('{') && value.endsWith('}')
}

const NEEDS_QUOTING = /[{}",\\\s]/

function quoteTag(tag: string): string {
	if (tag === '' || NEEDS_QUOTING.test(tag) || tag.toUpperCase() === 'NULL') {
		return `"${tag.replace(/[\\"]/g, '\\$&')}"`
	}
	return tag
}

export function encodeTags(tags: readonly string[]): string {
	return `{${tags.map(quoteTag).join(',')}}`
}

/**
 * Decodes an array literal into its elements. Quoted elements keep their
 * content verbatim (escapes resolved); unquoted ones are trimmed, and blank or
 * `NULL` entries are dropped. Anything that is not brace-delimited holds no
 * tags.
 */
export function decodeTags(encoded: string | null | undefined): string[] {
	if (!encoded || !isArrayLiteral(encoded)) return []

	const body = encoded.slice(1, -1)

	const tags: string[] = []
	let i = 0

	while (i < body.length) {
		while (i < body.length && /\s/.test(body[i])) i++
		if (i >= body.length) break

		if (body[i] === '"') {
			i++
			let token = ''
			while (i < body.length && body[i] !== '"') {
				if (body[i] === '\\' && i + 1 < body.length) i++
				token += body[i]
				i++
			}
			i++ // closing quote
			while (i < body.length && body[i] !== ',') i++
			tags.push(token)
		} else {
			let token = ''
			while (i < body.length && body[i] !== ',') {
				if (body[i] === '\\' && i + 1 < body.length) i++
				token += body[i]
				i++
			}
			token = token.trim()
			if (token !== '' && token.toUpperCase() !== 'NULL') tags.push(token)
		}

		if (body[i] === ',') i++
	}

	return tags
}

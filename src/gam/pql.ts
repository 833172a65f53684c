import type { KeyFilter, ValueFilter } from './gateway'
import type { PageWindow } from './types'

/** A PQL statement as sent to `get*ByStatement` / `perform*Action`. */
export interface Statement {
	readonly query: string
}

/**
 * Quote a user-supplied string as a PQL string literal.
 *
 * PQL literals are single-quoted. Ad Manager does not allow quotes or
 * backslashes inside key or value names, so rather than inventing an
 * escape sequence the API would reject anyway, we throw and let the
 * caller surface a validation error.
 */
export function quotePqlString(value: string): string {
	const problem = unsafePqlReason(value)
	if (problem) {
		throw new PqlInjectionError(`Invalid PQL value: ${problem}`, value)
	}
	return `'${value}'`
}

/** Why a string cannot be a PQL literal, or null when it can. */
export function unsafePqlReason(value: string): string | null {
	if (value.includes("'") || value.includes('"')) return 'contains a quote character'
	if (value.includes('\\')) return 'contains a backslash'
	if (/[\r\n]/.test(value)) return 'contains a line break'
	return null
}

/** Render a numeric id, rejecting anything that is not a safe integer. */
export function formatPqlId(id: number): string {
	if (!Number.isSafeInteger(id) || id < 0) {
		throw new PqlInjectionError('Invalid PQL id', String(id))
	}
	return String(id)
}

/** Thrown when a user-supplied value cannot be placed in a PQL literal. */
export class PqlInjectionError extends Error {
	readonly code = 'E_USAGE'
	override readonly name = 'PqlInjectionError'
	readonly context: { unsafeValue: string }

	constructor(message: string, unsafeValue: string) {
		super(message)
		this.context = { unsafeValue }
	}
}

function inList(items: readonly string[]): string {
	return `(${items.join(', ')})`
}

/** WHERE clause for a key filter, or null when it matches everything. */
export function keyFilterToWhere(filter: KeyFilter): string | null {
	if (filter.name === undefined) return null
	return `name = ${quotePqlString(filter.name)}`
}

/**
 * WHERE clause for a value filter. Empty `names`/`ids` lists would be
 * invalid PQL; callers must short-circuit before querying.
 */
export function valueFilterToWhere(filter: ValueFilter): string {
	const clauses = [`customTargetingKeyId = ${formatPqlId(filter.keyId)}`]
	if (filter.names) {
		if (filter.names.length === 0) {
			throw new PqlInjectionError('Empty name list in value filter', '')
		}
		clauses.push(`name IN ${inList(filter.names.map(quotePqlString))}`)
	}
	if (filter.ids) {
		if (filter.ids.length === 0) {
			throw new PqlInjectionError('Empty id list in value filter', '')
		}
		clauses.push(`id IN ${inList(filter.ids.map(formatPqlId))}`)
	}
	return clauses.join(' AND ')
}

/** Assemble a statement from an optional WHERE clause and optional window. */
export function buildStatement(
	where: string | null,
	window?: PageWindow,
): Statement {
	const parts: string[] = []
	if (where) parts.push(`WHERE ${where}`)
	if (window) {
		parts.push(`LIMIT ${window.limit}`)
		parts.push(`OFFSET ${window.offset}`)
	}
	return { query: parts.join(' ') }
}

import type { Table } from './types'

/**
 * Split one CSV line into fields (RFC 4180 quoting).
 *
 * Quoted fields may contain the delimiter and doubled quotes (`""`).
 * Unquoted fields are trimmed. Embedded line breaks are not supported;
 * callers split on newlines first.
 */
export function parseCsvLine(line: string, delimiter = ','): string[] {
	const fields: string[] = []
	let current = ''
	let inQuotes = false
	let i = 0

	while (i < line.length) {
		const ch = line.charAt(i)

		if (inQuotes) {
			if (ch === '"') {
				// Peek ahead: escaped quote ("") or end of quoted field
				if (line.charAt(i + 1) === '"') {
					current += '"'
					i += 2
				} else {
					inQuotes = false
					i += 1
				}
			} else {
				current += ch
				i += 1
			}
		} else {
			if (ch === '"') {
				inQuotes = true
				i += 1
			} else if (ch === delimiter) {
				fields.push(current.trim())
				current = ''
				i += 1
			} else {
				current += ch
				i += 1
			}
		}
	}

	fields.push(current.trim())
	return fields
}

/** Split text into non-blank lines, accepting LF and CRLF. */
export function splitLines(text: string): string[] {
	return text.split(/\r?\n/).filter((line) => line.trim().length > 0)
}

/**
 * Parse CSV text whose first non-blank line is the header.
 * Short rows are padded with empty cells, long rows truncated, so every
 * row has exactly one cell per column. Returns null for empty input.
 */
export function parseCsv(text: string): Table | null {
	const lines = splitLines(text.replace(/^\uFEFF/, ''))
	const [headerLine, ...body] = lines
	if (headerLine === undefined) return null
	const columns = parseCsvLine(headerLine)
	const rows = body.map((line) => {
		const cells = parseCsvLine(line)
		return columns.map((_, index) => cells[index] ?? '')
	})
	return { columns, rows }
}

/** `Dimension.AD_UNIT_NAME` -> `AD_UNIT_NAME`; names without a prefix are kept. */
export function stripColumnType(column: string): string {
	const dot = column.indexOf('.')
	return dot === -1 ? column : column.slice(dot + 1)
}

/** Index of a named column, or of the first column when no name is given. */
export function columnIndex(table: Table, column?: string): number {
	if (column === undefined) {
		if (table.columns.length === 0) throw new Error('Table has no columns')
		return 0
	}
	const index = table.columns.indexOf(column)
	if (index === -1) {
		throw new Error(
			`Unknown column "${column}" (available: ${table.columns.join(', ')})`,
		)
	}
	return index
}

function escapeCsvField(value: string): string {
	return /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value
}

/** Render a table as CSV text (header line first, trailing newline). */
export function formatCsv(table: Table): string {
	const lines = [table.columns, ...table.rows].map((row) =>
		row.map(escapeCsvField).join(','),
	)
	return `${lines.join('\n')}\n`
}

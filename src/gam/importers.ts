import { readFile } from 'node:fs/promises'
import { columnIndex, parseCsvLine, splitLines } from './csv'
import type { Table } from './types'

export interface FileImportOptions {
	/** Zero-based column to take (default 0). */
	readonly column?: number
	/** Drop the first non-blank line (default false). */
	readonly hasHeader?: boolean
	/** Keep only the first occurrence of each value (default true). */
	readonly unique?: boolean
	/** Field separator; whitespace runs when omitted. `,` honours CSV quoting. */
	readonly delimiter?: string
}

export interface TableImportOptions {
	/** Column name; first column when omitted. */
	readonly column?: string
	readonly unique?: boolean
}

/** Drop repeats, keeping first-occurrence order. */
export function uniqueInOrder(values: readonly string[]): string[] {
	return [...new Set(values)]
}

function splitFields(line: string, delimiter: string | undefined): string[] {
	if (delimiter === undefined) return line.trim().split(/\s+/)
	if (delimiter === ',') return parseCsvLine(line)
	return line.split(delimiter).map((field) => field.trim())
}

/** Extract one column of values from delimited text. */
export function importValuesFromText(
	text: string,
	options: FileImportOptions = {},
): string[] {
	const column = options.column ?? 0
	if (!Number.isInteger(column) || column < 0) {
		throw new Error(`Column index must be a non-negative integer, got ${column}`)
	}
	const lines = splitLines(text)
	const body = options.hasHeader ? lines.slice(1) : lines
	const values: string[] = []
	for (const line of body) {
		const field = splitFields(line, options.delimiter)[column]
		if (field === undefined || field.length === 0) continue
		values.push(field)
	}
	return options.unique === false ? values : uniqueInOrder(values)
}

/** Read a delimited text file and extract one column of values. */
export async function importValuesFromFile(
	filePath: string,
	options: FileImportOptions = {},
): Promise<string[]> {
	const text = await readFile(filePath, 'utf8')
	return importValuesFromText(text, options)
}

/** Take a named (or the first) column of a table. */
export function importValuesFromTable(
	table: Table,
	options: TableImportOptions = {},
): string[] {
	const index = columnIndex(table, options.column)
	const values = table.rows.map((row) => row[index] ?? '')
	return options.unique === false ? values : uniqueInOrder(values)
}

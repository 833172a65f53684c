import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError } from '../gam/errors'
import { importValuesFromFile } from '../gam/importers'
import type { CandidateValues } from '../gam/types'

const MAX_STDIN_BYTES = 5 * 1024 * 1024

const CandidateArraySchema = z
	.array(z.union([z.string(), z.number(), z.boolean()]))
	.max(100_000)

/** Where upload/deactivate read their values from. */
export interface ValueSourceFlags {
	readonly fromFile: string | null
	readonly column: number | null
	readonly hasHeader: boolean
	readonly delimiter: string | null
	readonly keepDuplicates?: boolean
}

export async function readStdinWithLimit(
	stream: AsyncIterable<Buffer | string> = process.stdin,
): Promise<string> {
	const chunks: Buffer[] = []
	let total = 0
	for await (const chunk of stream) {
		const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
		total += buffer.length
		if (total > MAX_STDIN_BYTES) {
			throw new ConfigError('Input exceeds 5MB limit', { code: 'E_USAGE' })
		}
		chunks.push(buffer)
	}
	return Buffer.concat(chunks).toString('utf8')
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
		)
		.join('; ')
}

/** Parse a JSON array of scalars (the stdin form of a value list). */
export function parseJsonValues(raw: string): CandidateValues {
	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch {
		throw new ConfigError('Input is not valid JSON (expected an array of values)', {
			code: 'E_USAGE',
		})
	}
	const parsed = CandidateArraySchema.safeParse(json)
	if (!parsed.success) {
		throw new ConfigError(`Invalid value list: ${describeIssues(parsed.error)}`, {
			code: 'E_USAGE',
		})
	}
	return { kind: 'list', values: parsed.data }
}

/** Values from `--from-file`, or a JSON array on stdin. */
export async function readCandidateValues(
	flags: ValueSourceFlags,
	stdin?: AsyncIterable<Buffer | string>,
): Promise<CandidateValues> {
	if (flags.fromFile) {
		const values = await importValuesFromFile(flags.fromFile, {
			column: flags.column ?? 0,
			hasHeader: flags.hasHeader,
			delimiter: flags.delimiter ?? undefined,
			unique: !flags.keepDuplicates,
		})
		return { kind: 'list', values }
	}
	return parseJsonValues(await readStdinWithLimit(stdin))
}

/** Read and parse a JSON file given on the command line. */
export async function readJsonFile<T extends z.ZodTypeAny>(
	filePath: string,
	schema: T,
	flag: string,
): Promise<z.infer<T>> {
	let raw: string
	try {
		raw = await readFile(filePath, 'utf8')
	} catch (err) {
		throw new ConfigError(`Cannot read ${flag} file: ${filePath}`, {
			code: 'E_USAGE',
			context: { path: filePath },
			cause: err,
		})
	}
	return parseJsonArgument(raw, schema, flag)
}

/** Parse an inline JSON argument against a schema. */
export function parseJsonArgument<T extends z.ZodTypeAny>(
	raw: string,
	schema: T,
	flag: string,
): z.infer<T> {
	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch {
		throw new ConfigError(`${flag} is not valid JSON`, { code: 'E_USAGE' })
	}
	const parsed = schema.safeParse(json)
	if (!parsed.success) {
		throw new ConfigError(`Invalid ${flag}: ${describeIssues(parsed.error)}`, {
			code: 'E_USAGE',
		})
	}
	return parsed.data
}

import { writeFile } from 'node:fs/promises'
import { z } from 'zod'
import { emitEvent } from '../../events'
import { formatCsv } from '../../gam/csv'
import { ConfigError } from '../../gam/errors'
import { type ReportSource, runReport } from '../../gam/reports'
import type { ReportFilter, ReportQuery } from '../../gam/types'
import { type CommandDeps, type ConnectionFlags, defaultDeps } from '../connection'
import { parseJsonArgument, readJsonFile } from '../input'
import type { ExitCode, OutputContext } from '../output'
import {
	EXIT_NOT_FOUND,
	EXIT_OK,
	EXIT_RUNTIME,
	handleCommandError,
	writeError,
	writeSuccess,
} from '../output'
import { ProgressDisplay } from '../progress'

const ReportQuerySchema = z.record(z.unknown())

const ReportFilterSchema = z.object({
	query: z.string().min(1),
	values: z
		.array(
			z.object({
				key: z.string().min(1),
				value: z.union([z.string(), z.number(), z.boolean()]),
			}),
		)
		.default([]),
})

export interface ReportCommand {
	readonly command: 'report'
	readonly connection: ConnectionFlags
	readonly savedQueryId: number | null
	readonly queryFile: string | null
	readonly params: string | null
	readonly filterFile: string | null
	readonly keepColumnTypes: boolean
	readonly out: string | null
	readonly pollIntervalMs: number | null
	readonly maxWaitMs: number | null
}

const FAILURE_CODES = {
	'report-not-found': { code: 'E_NOT_FOUND', exit: EXIT_NOT_FOUND },
	'incompatible-api-version': { code: 'E_INCOMPATIBLE_QUERY', exit: EXIT_RUNTIME },
	'report-failed': { code: 'E_REPORT_FAILED', exit: EXIT_RUNTIME },
	'empty-report': { code: 'E_EMPTY_REPORT', exit: EXIT_RUNTIME },
} as const

async function resolveSource(options: ReportCommand): Promise<ReportSource> {
	if (options.queryFile) {
		const query: ReportQuery = await readJsonFile(
			options.queryFile,
			ReportQuerySchema,
			'--query-file',
		)
		return { kind: 'query', query }
	}
	if (options.savedQueryId === null) {
		throw new ConfigError('A saved query id or --query-file is required', {
			code: 'E_USAGE',
		})
	}
	return { kind: 'saved', id: options.savedQueryId }
}

/** Run a saved or ad-hoc report and print or save the rows. */
export async function runReportCommand(
	ctx: OutputContext,
	options: ReportCommand,
	deps: CommandDeps = defaultDeps,
): Promise<ExitCode> {
	const progress = new ProgressDisplay(ctx.progressMode)
	try {
		const source = await resolveSource(options)
		const updatedParams: ReportQuery | undefined = options.params
			? parseJsonArgument(options.params, ReportQuerySchema, '--params')
			: undefined
		const filter: ReportFilter | undefined = options.filterFile
			? await readJsonFile(options.filterFile, ReportFilterSchema, '--filter-file')
			: undefined

		const api = await deps.openReports(ctx, options.connection)
		const result = await runReport(api, source, {
			updatedParams,
			filter,
			stripColumnTypes: !options.keepColumnTypes,
			pollIntervalMs: options.pollIntervalMs ?? undefined,
			maxWaitMs: options.maxWaitMs ?? undefined,
			onStatus: ({ reportJobId, elapsedMs }) =>
				progress.status(
					`Waiting for report job ${reportJobId} (${Math.round(elapsedMs / 1000)}s)`,
				),
		})
		progress.finish()

		if (!result.ok) {
			const mapped = FAILURE_CODES[result.reason]
			writeError(ctx, result.message, mapped.code, 'ReportError', {
				reason: result.reason,
				reportJobId: result.reportJobId,
			})
			return mapped.exit
		}

		const { table, reportJobId } = result
		emitEvent(ctx.eventsConfig, 'admanager-report-completed', {
			reportJobId,
			rowCount: table.rows.length,
		})
		if (options.out) {
			await writeFile(options.out, formatCsv(table), 'utf8')
			writeSuccess(
				ctx,
				{
					command: 'report',
					reportJobId,
					rowCount: table.rows.length,
					columns: table.columns,
					out: options.out,
				},
				[`Wrote ${table.rows.length} rows to ${options.out}`],
				options.out,
			)
			return EXIT_OK
		}
		writeSuccess(
			ctx,
			{
				command: 'report',
				reportJobId,
				rowCount: table.rows.length,
				columns: table.columns,
				rows: table.rows,
			},
			[formatCsv(table).trimEnd()],
			String(table.rows.length),
		)
		return EXIT_OK
	} catch (err) {
		progress.finish()
		return handleCommandError(ctx, err)
	}
}

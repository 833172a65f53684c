import { setTimeout as delay } from 'node:timers/promises'
import { promisify } from 'node:util'
import { gunzip } from 'node:zlib'
import { getAdManagerLogger, getLogContext } from '../logging'
import { parseCsv, stripColumnType } from './csv'
import { AdManagerApiError } from './errors'
import type { ReportGateway } from './gateway'
import type {
	ExportFormat,
	ReportFilter,
	ReportQuery,
	SavedQuery,
	Table,
} from './types'

const gunzipAsync = promisify(gunzip)
const reportLogger = getAdManagerLogger(['reports'])

const DEFAULT_POLL_INTERVAL_MS = 30_000
const DEFAULT_MAX_WAIT_MS = 30 * 60_000
const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000
const EXPORT_FORMAT: ExportFormat = 'CSV_DUMP'

export type ReportSource =
	| { readonly kind: 'saved'; readonly id: number }
	| { readonly kind: 'query'; readonly query: ReportQuery }

export interface RunReportOptions {
	/** Shallow override of report query fields. */
	readonly updatedParams?: ReportQuery
	/** Becomes the query's `statement`. */
	readonly filter?: ReportFilter
	/** Drop `Dimension.` / `Column.` prefixes from column names (default true). */
	readonly stripColumnTypes?: boolean
	readonly pollIntervalMs?: number
	readonly maxWaitMs?: number
	readonly downloadTimeoutMs?: number
	readonly onStatus?: (status: { readonly reportJobId: number; readonly elapsedMs: number }) => void
}

export type ReportFailureReason =
	| 'report-not-found'
	| 'incompatible-api-version'
	| 'report-failed'
	| 'empty-report'

export type ReportResult =
	| { readonly ok: true; readonly reportJobId: number; readonly table: Table }
	| {
			readonly ok: false
			readonly reason: ReportFailureReason
			readonly message: string
			readonly reportJobId?: number
	  }

/** Look up a saved query by id. */
export async function getSavedQuery(
	api: ReportGateway,
	id: number,
): Promise<SavedQuery | null> {
	return await api.getSavedQuery(id)
}

function failure(
	reason: ReportFailureReason,
	message: string,
	reportJobId?: number,
): ReportResult {
	reportLogger.warn('Report not produced ({reason}): {message}', {
		reason,
		message,
		reportJobId,
		...getLogContext(),
	})
	return { ok: false, reason, message, reportJobId }
}

/** Apply overrides and the filter statement to a base query. */
export function buildReportQuery(
	base: ReportQuery,
	options: Pick<RunReportOptions, 'updatedParams' | 'filter'> = {},
): ReportQuery {
	const query: Record<string, unknown> = { ...base, ...options.updatedParams }
	if (options.filter) query.statement = options.filter
	return query
}

/** Fetch a report download and decode it (gzip detected by magic bytes). */
export async function downloadReport(
	url: string,
	timeoutMs = DEFAULT_DOWNLOAD_TIMEOUT_MS,
): Promise<string> {
	const controller = new AbortController()
	const timeout = setTimeout(() => controller.abort(), timeoutMs)
	try {
		const response = await fetch(url, { signal: controller.signal })
		if (!response.ok) {
			throw new AdManagerApiError(
				`Report download failed (${response.status})`,
				{
					code: response.status >= 500 ? 'E_SERVER_ERROR' : 'E_API_ERROR',
					recoverable: response.status >= 500,
					status: response.status,
				},
			)
		}
		const body = Buffer.from(await response.arrayBuffer())
		const isGzip = body.length >= 2 && body[0] === 0x1f && body[1] === 0x8b
		const decoded = isGzip ? await gunzipAsync(body) : body
		return decoded.toString('utf8')
	} catch (err) {
		if (err instanceof AdManagerApiError) throw err
		const aborted = err instanceof Error && err.name === 'AbortError'
		throw new AdManagerApiError(
			aborted ? 'Report download timed out' : 'Report download failed',
			{ code: 'E_NETWORK', recoverable: true, cause: err },
		)
	} finally {
		clearTimeout(timeout)
	}
}

async function resolveQuery(
	api: ReportGateway,
	source: ReportSource,
): Promise<{ readonly query: ReportQuery } | { readonly failed: ReportResult }> {
	if (source.kind === 'query') return { query: source.query }
	const saved = await api.getSavedQuery(source.id)
	if (!saved) {
		return {
			failed: failure(
				'report-not-found',
				`Saved query ${source.id} not found; check it is shared with the service account`,
			),
		}
	}
	if (!saved.isCompatibleWithApiVersion || !saved.reportQuery) {
		return {
			failed: failure(
				'incompatible-api-version',
				`Saved query ${source.id} cannot run with this API version`,
			),
		}
	}
	return { query: saved.reportQuery }
}

/**
 * Run a saved or ad-hoc report and return its rows.
 *
 * Polls the job every `pollIntervalMs` until it completes, fails or
 * `maxWaitMs` elapses.
 */
export async function runReport(
	api: ReportGateway,
	source: ReportSource,
	options: RunReportOptions = {},
): Promise<ReportResult> {
	const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
	const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS

	const resolved = await resolveQuery(api, source)
	if ('failed' in resolved) return resolved.failed
	const query = buildReportQuery(resolved.query, options)

	const reportJobId = await api.runReportJob(query)
	reportLogger.info('Submitted report job {reportJobId}', {
		reportJobId,
		...getLogContext(),
	})

	const startedAt = Date.now()
	for (;;) {
		const status = await api.getReportJobStatus(reportJobId)
		if (status === 'COMPLETED') break
		if (status === 'FAILED') {
			return failure('report-failed', `Report job ${reportJobId} failed`, reportJobId)
		}
		const elapsedMs = Date.now() - startedAt
		if (elapsedMs >= maxWaitMs) {
			return failure(
				'report-failed',
				`Report job ${reportJobId} did not complete within ${maxWaitMs}ms`,
				reportJobId,
			)
		}
		options.onStatus?.({ reportJobId, elapsedMs })
		await delay(pollIntervalMs)
	}

	const url = await api.getReportDownloadUrl(reportJobId, EXPORT_FORMAT)
	const text = await downloadReport(url, options.downloadTimeoutMs)
	const table = parseCsv(text)
	if (!table) {
		return failure('empty-report', `Report job ${reportJobId} returned no data`, reportJobId)
	}
	reportLogger.info('Report job {reportJobId} returned {rowCount} rows', {
		reportJobId,
		rowCount: table.rows.length,
		...getLogContext(),
	})
	return {
		ok: true,
		reportJobId,
		table:
			options.stripColumnTypes === false
				? table
				: { columns: table.columns.map(stripColumnType), rows: table.rows },
	}
}

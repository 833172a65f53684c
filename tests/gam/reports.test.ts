import { gzipSync } from 'node:zlib'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { AdManagerApiError } from '../../src/gam/errors'
import { buildReportQuery, downloadReport, runReport } from '../../src/gam/reports'
import { FakeReports } from '../helpers/fake-ad-manager'

const CSV = 'Dimension.DATE,Column.AD_SERVER_IMPRESSIONS\n2024-01-01,10\n2024-01-02,12\n'

function stubDownload(body: Uint8Array | string, status = 200) {
	const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body
	const fetchMock = vi.fn(async (_url: string) => ({
		ok: status >= 200 && status < 300,
		status,
		arrayBuffer: async () => Uint8Array.from(bytes).buffer,
	}))
	vi.stubGlobal('fetch', fetchMock)
	return fetchMock
}

const weekly = {
	id: 99,
	name: 'Weekly delivery',
	isCompatibleWithApiVersion: true,
	reportQuery: { dimensions: ['DATE'], dateRangeType: 'LAST_WEEK' },
}

afterEach(() => {
	vi.unstubAllGlobals()
})

describe('buildReportQuery', () => {
	it('overrides fields and attaches the filter as the statement', () => {
		const filter = { query: 'WHERE ORDER_ID = :id', values: [{ key: 'id', value: 5 }] }

		expect(
			buildReportQuery(
				{ dimensions: ['DATE'], dateRangeType: 'LAST_WEEK' },
				{ updatedParams: { dateRangeType: 'YESTERDAY' }, filter },
			),
		).toEqual({ dimensions: ['DATE'], dateRangeType: 'YESTERDAY', statement: filter })
	})
})

describe('runReport', () => {
	it('runs a saved query and returns rows with bare column names', async () => {
		const fetchMock = stubDownload(gzipSync(CSV))
		const api = new FakeReports({
			savedQueries: [weekly],
			statuses: ['IN_PROGRESS', 'COMPLETED'],
		})
		const polls: number[] = []

		const result = await runReport(
			api,
			{ kind: 'saved', id: 99 },
			{
				updatedParams: { dateRangeType: 'YESTERDAY' },
				pollIntervalMs: 0,
				onStatus: (status) => polls.push(status.reportJobId),
			},
		)

		expect(result).toEqual({
			ok: true,
			reportJobId: 7001,
			table: {
				columns: ['DATE', 'AD_SERVER_IMPRESSIONS'],
				rows: [
					['2024-01-01', '10'],
					['2024-01-02', '12'],
				],
			},
		})
		expect(api.submitted).toEqual([{ dimensions: ['DATE'], dateRangeType: 'YESTERDAY' }])
		expect(api.downloads).toEqual([{ reportJobId: 7001, format: 'CSV_DUMP' }])
		expect(polls).toEqual([7001])
		expect(fetchMock).toHaveBeenCalledWith(
			'https://reports.test/download/7001',
			expect.objectContaining({ signal: expect.any(AbortSignal) }),
		)
	})

	it('runs an ad-hoc query and can keep column prefixes', async () => {
		stubDownload(CSV)
		const api = new FakeReports()

		const result = await runReport(
			api,
			{ kind: 'query', query: { dimensions: ['DATE'] } },
			{ stripColumnTypes: false, pollIntervalMs: 0 },
		)

		expect(result.ok && result.table.columns).toEqual([
			'Dimension.DATE',
			'Column.AD_SERVER_IMPRESSIONS',
		])
	})

	it('reports a saved query it cannot see', async () => {
		const api = new FakeReports()

		const result = await runReport(api, { kind: 'saved', id: 5 })

		expect(result).toEqual({
			ok: false,
			reason: 'report-not-found',
			message: 'Saved query 5 not found; check it is shared with the service account',
			reportJobId: undefined,
		})
		expect(api.submitted).toEqual([])
	})

	it('refuses a saved query incompatible with the API version', async () => {
		const api = new FakeReports({
			savedQueries: [{ ...weekly, isCompatibleWithApiVersion: false }],
		})

		const result = await runReport(api, { kind: 'saved', id: 99 })

		expect(result).toMatchObject({ ok: false, reason: 'incompatible-api-version' })
		expect(api.submitted).toEqual([])
	})

	it('reports a failed job', async () => {
		const api = new FakeReports({ statuses: ['IN_PROGRESS', 'FAILED'] })

		const result = await runReport(api, { kind: 'query', query: {} }, { pollIntervalMs: 0 })

		expect(result).toEqual({
			ok: false,
			reason: 'report-failed',
			message: 'Report job 7001 failed',
			reportJobId: 7001,
		})
	})

	it('gives up after the maximum wait', async () => {
		const api = new FakeReports({ statuses: ['IN_PROGRESS'] })

		const result = await runReport(
			api,
			{ kind: 'query', query: {} },
			{ pollIntervalMs: 0, maxWaitMs: 0 },
		)

		expect(result).toMatchObject({
			ok: false,
			reason: 'report-failed',
			message: 'Report job 7001 did not complete within 0ms',
		})
		expect(api.downloads).toEqual([])
	})

	it('reports an empty download', async () => {
		stubDownload('')
		const api = new FakeReports()

		const result = await runReport(api, { kind: 'query', query: {} })

		expect(result).toMatchObject({ ok: false, reason: 'empty-report', reportJobId: 7001 })
	})
})

describe('downloadReport', () => {
	it('returns plain text unchanged', async () => {
		stubDownload('a,b\n1,2\n')

		await expect(downloadReport('https://reports.test/x')).resolves.toBe('a,b\n1,2\n')
	})

	it('maps an HTTP failure', async () => {
		stubDownload('denied', 403)

		const error = await downloadReport('https://reports.test/x').catch((err: unknown) => err)

		expect(error).toBeInstanceOf(AdManagerApiError)
		expect(error).toMatchObject({
			code: 'E_API_ERROR',
			status: 403,
			message: 'Report download failed (403)',
		})
	})

	it('maps a transport failure', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => {
				throw new TypeError('fetch failed')
			}),
		)

		await expect(downloadReport('https://reports.test/x')).rejects.toMatchObject({
			code: 'E_NETWORK',
			recoverable: true,
			message: 'Report download failed',
		})
	})
})

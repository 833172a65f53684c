import { configure, getConsoleSink } from '@logtape/logtape'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { helpText, parseCli, runCli, VERSION } from '../../src/cli/command'
import type { CommandDeps } from '../../src/cli/connection'
import { captureOutput } from '../helpers/capture'
import { FakeCustomTargeting, FakeReports } from '../helpers/fake-ad-manager'

function argv(...args: string[]): string[] {
	return ['node', 'admanager', ...args]
}

describe('parseCli', () => {
	it('parses an upload with every value-source flag', () => {
		const result = parseCli(
			argv(
				'upload',
				'geo',
				'--from-file',
				'values.tsv',
				'--column=1',
				'--has-header',
				'--delimiter',
				'tab',
				'--batch-size',
				'1',
				'--network',
				'1234',
				'--execute',
			),
		)

		expect(result.ok).toBe(true)
		if (!result.ok) return
		expect(result.options).toMatchObject({
			command: 'upload',
			keyName: 'geo',
			connection: { credentialsPath: null, networkCode: '1234' },
			source: {
				fromFile: 'values.tsv',
				column: 1,
				hasHeader: true,
				delimiter: '\t',
				keepDuplicates: false,
			},
			createKey: false,
			batchSize: 1,
			execute: true,
		})
	})

	it('lets --dry-run override an earlier --execute', () => {
		const result = parseCli(argv('deactivate', 'geo', '--execute', '--dry-run'))

		expect(result.ok && result.options).toMatchObject({ command: 'deactivate', execute: false })
	})

	it('converts report timings to milliseconds', () => {
		const result = parseCli(argv('report', '12', '--poll-interval', '5', '--max-wait', '60'))

		expect(result.ok && result.options).toMatchObject({
			command: 'report',
			savedQueryId: 12,
			queryFile: null,
			pollIntervalMs: 5000,
			maxWaitMs: 60_000,
		})
	})

	it('accepts --display-names for values', () => {
		const result = parseCli(argv('values', 'geo', '--display-names'))

		expect(result.ok && result.options).toMatchObject({
			command: 'values',
			keyName: 'geo',
			displayNames: true,
		})
	})

	it('routes --help on a command to its help topic', () => {
		const result = parseCli(argv('upload', '--help'))

		expect(result.ok && result.options).toMatchObject({ command: 'help', topic: 'upload' })
	})

	it('defaults to help without a command', () => {
		expect(parseCli(argv())).toMatchObject({ ok: true, options: { command: 'help', topic: null } })
	})

	it.each([
		[['key'], 'Missing key name for key'],
		[['values', 'geo', '--from-file', 'x.txt'], '--from-file is only valid for upload and deactivate'],
		[['create-key', 'geo', '--create-key'], '--create-key is only valid for upload'],
		[['upload', 'geo', '--out', 'x.csv'], '--out is only valid for report'],
		[['key', 'geo', '--display-names'], '--display-names is only valid for values'],
		[['upload', 'geo', '--batch-size', '0'], 'Invalid --batch-size value'],
		[['upload', 'geo', '--column', 'two'], 'Invalid --column value'],
		[['key', 'geo', '--network', 'abc'], 'Invalid --network value'],
		[['report', '99', '--query-file', 'q.json'], 'Use either a saved query id or --query-file, not both'],
		[['report'], 'Missing saved query id or --query-file'],
		[['report', 'weekly'], 'Invalid saved query id: weekly'],
		[['key', 'geo', 'extra'], 'Unexpected extra argument: extra'],
		[['--frobnicate'], 'Unknown option: --frobnicate'],
		[['frobnicate'], 'Unknown command: frobnicate'],
		[['key', 'geo', '--credentials'], 'Missing value for --credentials'],
	])('rejects %j', (args, message) => {
		const result = parseCli(argv(...args))

		expect(result).toMatchObject({ ok: false, exitCode: 2, errorCode: 'E_USAGE', message })
	})
})

describe('helpText', () => {
	it('falls back to the usage text for unknown topics', () => {
		expect(helpText('nope')).toBe(helpText(null))
		expect(helpText('report').startsWith('admanager report <savedQueryId>')).toBe(true)
	})
})

describe('runCli', () => {
	beforeEach(async () => {
		vi.stubEnv('ADMANAGER_EVENTS', '0')
		await configure({
			reset: true,
			sinks: { stderr: getConsoleSink() },
			loggers: [],
		})
	})

	afterEach(() => {
		vi.unstubAllEnvs()
	})

	it('emits JSON envelope with schemaVersion', async () => {
		const capture = captureOutput()
		const exitCode = await runCli(argv('help', '--json'))
		capture.restore()

		expect(exitCode).toBe(0)
		expect(capture.getStderr()).toBe('')
		expect(JSON.parse(capture.getStdout())).toEqual({
			status: 'data',
			schemaVersion: 1,
			data: { command: 'help', topic: null },
		})
	})

	it('keeps stderr empty on success with --quiet', async () => {
		const capture = captureOutput()
		const exitCode = await runCli(argv('help', '--quiet'))
		capture.restore()

		expect(exitCode).toBe(0)
		expect(capture.getStderr()).toBe('')
	})

	it('prints the version', async () => {
		const capture = captureOutput()
		const exitCode = await runCli(argv('--version', '--json'))
		capture.restore()

		expect(exitCode).toBe(0)
		expect(JSON.parse(capture.getStdout()).data).toEqual({ command: 'version', version: VERSION })
	})

	it('emits structured error on invalid args', async () => {
		const capture = captureOutput()
		const exitCode = await runCli(argv('--unknown', '--json'))
		capture.restore()

		expect(exitCode).toBe(2)
		expect(capture.getStdout()).toBe('')
		expect(JSON.parse(capture.getStderr())).toEqual({
			status: 'error',
			message: 'Unknown option: --unknown',
			error: { name: 'UsageError', code: 'E_USAGE', action: 'FIX_ARGS', retryable: false },
		})
	})

	it('dispatches to a command with the given dependencies', async () => {
		const api = new FakeCustomTargeting()
		const key = api.addKey('geo')
		const deps: CommandDeps = {
			openTargeting: async () => api,
			openReports: async () => new FakeReports(),
		}

		const capture = captureOutput()
		const exitCode = await runCli(argv('key', 'geo', '--json'), deps)
		capture.restore()

		expect(exitCode).toBe(0)
		expect(JSON.parse(capture.getStdout()).data).toEqual({ command: 'key', key })
	})
})

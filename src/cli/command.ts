import { randomUUID } from 'node:crypto'
import { emitEvent, resolveEventsConfig } from '../events'
import {
	getAdManagerLogger,
	setupLogging,
	shutdownLogging,
	withContext,
} from '../logging'
import { type DeactivateCommand, runDeactivate } from './commands/deactivate'
import {
	type CreateKeyCommand,
	type KeyCommand,
	runCreateKey,
	runKey,
	runValues,
	type ValuesCommand,
} from './commands/keys'
import { type ReportCommand, runReportCommand } from './commands/report'
import { runStatus, type StatusCommand } from './commands/status'
import { runUpload, type UploadCommand } from './commands/upload'
import { type CommandDeps, type ConnectionFlags, defaultDeps } from './connection'
import type { ValueSourceFlags } from './input'
import type { ExitCode, OutputContext, ProgressMode } from './output'
import {
	EXIT_INTERRUPTED,
	EXIT_OK,
	EXIT_RUNTIME,
	EXIT_USAGE,
	sanitizeErrorMessage,
	writeError,
	writeSuccess,
} from './output'

/** Logger for CLI arg parsing, command dispatch, and output formatting. */
const cliLogger = getAdManagerLogger(['cli'])

export const VERSION = '0.1.0'

type LogLevel = 'silent' | 'info' | 'debug'

interface HelpCommand {
	readonly command: 'help'
	readonly topic: string | null
}

type CommandOptions =
	| StatusCommand
	| KeyCommand
	| CreateKeyCommand
	| ValuesCommand
	| UploadCommand
	| DeactivateCommand
	| ReportCommand
	| HelpCommand

type CliOptions = CommandOptions & OutputContext

interface ParseCliError {
	readonly ok: false
	readonly exitCode: ExitCode
	readonly message: string
	readonly output: string
	readonly errorCode: string
	readonly context?: Record<string, unknown>
	readonly json: boolean
	readonly quiet: boolean
}

interface ParseCliOk {
	readonly ok: true
	readonly options: CliOptions
}

type ParseCliResult = ParseCliError | ParseCliOk

/**
 * Result of attempting to parse a value-taking flag (e.g. --flag value or --flag=value).
 * Returns null when the token does not match the flag name at all.
 */
type ValueFlagResult =
	| null
	| { readonly value: string; readonly nextIndex: number }
	| ParseCliError

/**
 * Parse a value-taking flag that supports both `--flag value` and `--flag=value` forms.
 * Returns null if the token does not match the flag, a ParseCliError if the value is
 * missing, or the parsed value and next loop index on success.
 */
function parseValueFlag(
	token: string,
	args: readonly string[],
	index: number,
	flag: string,
	json: boolean,
	quiet: boolean,
): ValueFlagResult {
	if (token === flag) {
		const value = args[index + 1]
		if (!value || value.startsWith('--')) {
			return parseUsageError(`Missing value for ${flag}`, json, quiet)
		}
		return { value, nextIndex: index + 1 }
	}
	const prefix = `${flag}=`
	if (token.startsWith(prefix)) {
		const value = token.slice(prefix.length)
		if (!value) {
			return parseUsageError(`Missing value for ${flag}`, json, quiet)
		}
		return { value, nextIndex: index }
	}
	return null
}

const KEY_COMMANDS = new Set(['key', 'create-key', 'values', 'upload', 'deactivate'])
const VALUE_SOURCE_COMMANDS = new Set(['upload', 'deactivate'])
const UPLOAD_ONLY_FLAGS = ['--create-key', '--batch-size', '--keep-duplicates'] as const
const REPORT_ONLY_FLAGS = [
	'--query-file',
	'--params',
	'--filter-file',
	'--keep-column-types',
	'--out',
	'--poll-interval',
	'--max-wait',
] as const

function parseInteger(raw: string, min: number): number | null {
	if (!/^\d+$/.test(raw)) return null
	const value = Number(raw)
	return Number.isSafeInteger(value) && value >= min ? value : null
}

function parseDelimiter(raw: string): string {
	if (raw === 'tab' || raw === '\\t') return '\t'
	return raw
}

/** Parse argv into structured command options.
 *  Returns a discriminated union instead of throwing to preserve output mode. */
export function parseCli(argv: readonly string[]): ParseCliResult {
	const args = argv.slice(2)
	const preFlags = new Set(args)
	let commandToken: string | null = null
	let json = preFlags.has('--json')
	let quiet = preFlags.has('--quiet')
	let verbose = preFlags.has('--verbose')
	let debug = preFlags.has('--debug')
	let help = false
	let positional: string | null = null
	let eventsUrl: string | null = null
	let credentialsPath: string | null = null
	let networkRaw: string | null = null
	let fromFile: string | null = null
	let columnRaw: string | null = null
	let delimiterRaw: string | null = null
	let batchSizeRaw: string | null = null
	let queryFile: string | null = null
	let params: string | null = null
	let filterFile: string | null = null
	let out: string | null = null
	let pollIntervalRaw: string | null = null
	let maxWaitRaw: string | null = null
	let hasHeader = false
	let createKey = false
	let keepDuplicates = false
	let keepColumnTypes = false
	let displayNames = false
	let execute = false
	const seen = new Set<string>()

	for (let i = 0; i < args.length; i += 1) {
		const token = args[i]
		if (!token) continue
		if (token === '--json') {
			json = true
			continue
		}
		if (token === '--quiet') {
			quiet = true
			continue
		}
		if (token === '--verbose') {
			verbose = true
			continue
		}
		if (token === '--debug') {
			debug = true
			continue
		}
		if (token === '--has-header') {
			hasHeader = true
			seen.add(token)
			continue
		}
		if (token === '--create-key') {
			createKey = true
			seen.add(token)
			continue
		}
		if (token === '--keep-duplicates') {
			keepDuplicates = true
			seen.add(token)
			continue
		}
		if (token === '--keep-column-types') {
			keepColumnTypes = true
			seen.add(token)
			continue
		}
		if (token === '--display-names') {
			displayNames = true
			seen.add(token)
			continue
		}
		if (token === '--execute') {
			execute = true
			continue
		}
		if (token === '--dry-run') {
			execute = false
			continue
		}
		// -- Value-taking flags (--flag value / --flag=value) --
		const valueFlagDefs: Array<{
			flag: string
			assign: (v: string) => void
		}> = [
			{ flag: '--events-url', assign: (v) => (eventsUrl = v) },
			{ flag: '--credentials', assign: (v) => (credentialsPath = v) },
			{ flag: '--network', assign: (v) => (networkRaw = v) },
			{ flag: '--from-file', assign: (v) => (fromFile = v) },
			{ flag: '--column', assign: (v) => (columnRaw = v) },
			{ flag: '--delimiter', assign: (v) => (delimiterRaw = v) },
			{ flag: '--batch-size', assign: (v) => (batchSizeRaw = v) },
			{ flag: '--query-file', assign: (v) => (queryFile = v) },
			{ flag: '--params', assign: (v) => (params = v) },
			{ flag: '--filter-file', assign: (v) => (filterFile = v) },
			{ flag: '--out', assign: (v) => (out = v) },
			{ flag: '--poll-interval', assign: (v) => (pollIntervalRaw = v) },
			{ flag: '--max-wait', assign: (v) => (maxWaitRaw = v) },
		]
		let valueFlagMatched = false
		for (const { flag, assign } of valueFlagDefs) {
			const result = parseValueFlag(token, args, i, flag, json, quiet)
			if (result === null) continue
			if ('ok' in result) return result // ParseCliError
			assign(result.value)
			seen.add(flag)
			i = result.nextIndex
			valueFlagMatched = true
			break
		}
		if (valueFlagMatched) continue

		if (token === '--help' || token === '-h') {
			help = true
			continue
		}
		if (token === '--version') {
			commandToken = 'version'
			continue
		}
		if (token.startsWith('-')) {
			return parseUsageError(`Unknown option: ${token}`, json, quiet)
		}
		if (!commandToken) {
			commandToken = token
			continue
		}
		if (!positional) {
			positional = token
			continue
		}
		return parseUsageError(`Unexpected extra argument: ${token}`, json, quiet)
	}

	if (!commandToken) {
		commandToken = 'help'
	}
	if (help && commandToken !== 'help') {
		positional = commandToken === 'version' ? null : commandToken
		commandToken = 'help'
	}

	const outputMode = resolveOutputMode({
		json,
		quiet,
		verbose,
		debug,
		eventsUrl,
	})

	if (commandToken === 'help') {
		return { ok: true, options: { command: 'help', ...outputMode, topic: positional } }
	}
	if (commandToken === 'version') {
		return { ok: true, options: { command: 'help', ...outputMode, topic: 'version' } }
	}

	if (networkRaw !== null && parseInteger(networkRaw, 1) === null) {
		return parseUsageError('Invalid --network value', json, quiet, {
			network: networkRaw,
		})
	}
	const connection: ConnectionFlags = { credentialsPath, networkCode: networkRaw }

	if (!VALUE_SOURCE_COMMANDS.has(commandToken)) {
		for (const flag of ['--from-file', '--column', '--has-header', '--delimiter']) {
			if (seen.has(flag)) {
				return parseUsageError(`${flag} is only valid for upload and deactivate`, json, quiet)
			}
		}
	}
	if (commandToken !== 'upload') {
		for (const flag of UPLOAD_ONLY_FLAGS) {
			if (seen.has(flag)) {
				return parseUsageError(`${flag} is only valid for upload`, json, quiet)
			}
		}
	}
	if (commandToken !== 'values' && seen.has('--display-names')) {
		return parseUsageError('--display-names is only valid for values', json, quiet)
	}
	if (commandToken !== 'report') {
		for (const flag of REPORT_ONLY_FLAGS) {
			if (seen.has(flag)) {
				return parseUsageError(`${flag} is only valid for report`, json, quiet)
			}
		}
	}

	if (commandToken === 'status') {
		if (positional) {
			return parseUsageError(`Unexpected extra argument: ${positional}`, json, quiet)
		}
		return { ok: true, options: { command: 'status', ...outputMode, connection } }
	}

	if (KEY_COMMANDS.has(commandToken) && !positional) {
		return parseUsageError(`Missing key name for ${commandToken}`, json, quiet)
	}
	const keyName = positional ?? ''

	if (commandToken === 'key') {
		return { ok: true, options: { command: 'key', ...outputMode, connection, keyName } }
	}
	if (commandToken === 'create-key') {
		return {
			ok: true,
			options: { command: 'create-key', ...outputMode, connection, keyName },
		}
	}
	if (commandToken === 'values') {
		return {
			ok: true,
			options: { command: 'values', ...outputMode, connection, keyName, displayNames },
		}
	}
	if (commandToken === 'upload' || commandToken === 'deactivate') {
		const column = columnRaw === null ? null : parseInteger(columnRaw, 0)
		if (columnRaw !== null && column === null) {
			return parseUsageError('Invalid --column value', json, quiet)
		}
		const source: ValueSourceFlags = {
			fromFile,
			column,
			hasHeader,
			delimiter: delimiterRaw === null ? null : parseDelimiter(delimiterRaw),
			keepDuplicates,
		}
		if (commandToken === 'deactivate') {
			return {
				ok: true,
				options: {
					command: 'deactivate',
					...outputMode,
					connection,
					keyName,
					source,
					execute,
				},
			}
		}
		const batchSize = batchSizeRaw === null ? null : parseInteger(batchSizeRaw, 1)
		if (batchSizeRaw !== null && batchSize === null) {
			return parseUsageError('Invalid --batch-size value', json, quiet)
		}
		return {
			ok: true,
			options: {
				command: 'upload',
				...outputMode,
				connection,
				keyName,
				source,
				createKey,
				batchSize,
				keepDuplicates,
				execute,
			},
		}
	}
	if (commandToken === 'report') {
		if (positional && queryFile) {
			return parseUsageError(
				'Use either a saved query id or --query-file, not both',
				json,
				quiet,
			)
		}
		if (!positional && !queryFile) {
			return parseUsageError('Missing saved query id or --query-file', json, quiet)
		}
		const savedQueryId = positional === null ? null : parseInteger(positional, 1)
		if (positional !== null && savedQueryId === null) {
			return parseUsageError(`Invalid saved query id: ${positional}`, json, quiet)
		}
		const pollSeconds = pollIntervalRaw === null ? null : parseInteger(pollIntervalRaw, 0)
		if (pollIntervalRaw !== null && pollSeconds === null) {
			return parseUsageError('Invalid --poll-interval value', json, quiet)
		}
		const maxWaitSeconds = maxWaitRaw === null ? null : parseInteger(maxWaitRaw, 1)
		if (maxWaitRaw !== null && maxWaitSeconds === null) {
			return parseUsageError('Invalid --max-wait value', json, quiet)
		}
		return {
			ok: true,
			options: {
				command: 'report',
				...outputMode,
				connection,
				savedQueryId,
				queryFile,
				params,
				filterFile,
				keepColumnTypes,
				out,
				pollIntervalMs: pollSeconds === null ? null : pollSeconds * 1000,
				maxWaitMs: maxWaitSeconds === null ? null : maxWaitSeconds * 1000,
			},
		}
	}

	return parseUsageError(`Unknown command: ${commandToken}`, json, quiet)
}

function parseUsageError(
	message: string,
	json: boolean,
	quiet: boolean,
	context?: Record<string, unknown>,
): ParseCliError {
	return {
		ok: false,
		exitCode: EXIT_USAGE,
		message,
		output: usageText(),
		errorCode: 'E_USAGE',
		context,
		json,
		quiet,
	}
}

function resolveOutputMode(flags: {
	readonly json: boolean
	readonly quiet: boolean
	readonly verbose: boolean
	readonly debug: boolean
	readonly eventsUrl: string | null
}): OutputContext {
	let json = flags.json
	if (!json && !process.stdout.isTTY) {
		json = true
	}

	const logLevel: LogLevel = flags.debug
		? 'debug'
		: flags.quiet
			? 'silent'
			: flags.verbose
				? 'info'
				: 'silent'

	const progressMode: ProgressMode =
		json || flags.quiet
			? 'off'
			: process.stderr.isTTY
				? flags.verbose || flags.debug
					? 'static'
					: 'animated'
				: 'static'

	return {
		json,
		quiet: flags.quiet,
		logLevel,
		progressMode,
		eventsConfig: resolveEventsConfig({ eventsUrl: flags.eventsUrl }),
	}
}

const HELP_TOPICS: Record<string, string[]> = {
	upload: [
		'admanager upload <key> [--from-file <path>] [flags]',
		'',
		'Adds the values the key does not have yet. Reads --from-file, or a',
		'JSON array of values on stdin. Dry run unless --execute.',
		'',
		'  --column <n>        Zero-based column of --from-file (default 0)',
		'  --has-header        Skip the first line of --from-file',
		'  --delimiter <c>     Field separator (default whitespace; "tab" for TAB)',
		'  --create-key        Create the key as FREEFORM when missing',
		'  --batch-size <n>    Values per creation request (default 200)',
		'  --keep-duplicates   Submit repeated new values as often as given',
		'  --execute           Apply the changes',
	],
	deactivate: [
		'admanager deactivate <key> [--from-file <path>] [flags]',
		'',
		'Deactivates the listed values of a key and reports names that do',
		'not exist. Dry run unless --execute.',
	],
	report: [
		'admanager report <savedQueryId> | --query-file <json> [flags]',
		'',
		'  --params <json>       Override report query fields',
		'  --filter-file <json>  {"query": "...", "values": [{"key", "value"}]}',
		'  --keep-column-types   Keep Dimension./Column. prefixes',
		'  --out <path>          Write CSV to a file',
		'  --poll-interval <s>   Seconds between status checks (default 30)',
		'  --max-wait <s>        Give up after this many seconds (default 1800)',
	],
}

function usageText(): string {
	return [
		'admanager',
		'',
		'Usage:',
		'  admanager <command> [flags]',
		'',
		'Commands:',
		'  status                 Check config, credentials and token exchange',
		'  key <name>             Look up a targeting key',
		'  create-key <name>      Create a FREEFORM targeting key',
		'  values <key>           List the values of a key',
		'  upload <key>           Add new values to a key',
		'  deactivate <key>       Deactivate values of a key',
		'  report <id>            Run a saved or ad-hoc report',
		'  help [topic]           Show help',
		'',
		'Global Flags:',
		'  --credentials <file>   Service-account key file (ADMANAGER_CREDENTIALS)',
		'  --network <code>       Network code (ADMANAGER_NETWORK_CODE)',
		'  --json                 JSON output',
		'  --quiet                Minimal output',
		'  --verbose              Info logs on stderr',
		'  --debug                Debug logs on stderr (implies verbose)',
		'  --events-url           Observability server URL',
		'  --help                 Show help',
		'  --version              Show version',
	].join('\n')
}

export function helpText(topic: string | null): string {
	const lines = topic ? HELP_TOPICS[topic] : undefined
	return lines ? lines.join('\n') : usageText()
}

/**
 * Strip output plumbing from CLI options before logging.
 * Returns a plain object safe for structured log properties.
 */
function sanitizeCliOptions(options: CliOptions): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(options).filter(([name]) => name !== 'eventsConfig'),
	)
}

/** Derive the output mode label for events: json > quiet > human. */
function resolveMode(ctx: OutputContext): 'json' | 'quiet' | 'human' {
	if (ctx.json) return 'json'
	if (ctx.quiet) return 'quiet'
	return 'human'
}

async function dispatch(
	ctx: OutputContext,
	options: CliOptions,
	deps: CommandDeps,
): Promise<ExitCode> {
	switch (options.command) {
		case 'status':
			return await runStatus(ctx, options)
		case 'key':
			return await runKey(ctx, options, deps)
		case 'create-key':
			return await runCreateKey(ctx, options, deps)
		case 'values':
			return await runValues(ctx, options, deps)
		case 'upload':
			return await runUpload(ctx, options, deps)
		case 'deactivate':
			return await runDeactivate(ctx, options, deps)
		case 'report':
			return await runReportCommand(ctx, options, deps)
		case 'help': {
			if (options.topic === 'version') {
				writeSuccess(
					ctx,
					{ command: 'version', version: VERSION },
					[`admanager v${VERSION}`],
					VERSION,
				)
				return EXIT_OK
			}
			writeSuccess(
				ctx,
				{ command: 'help', topic: options.topic },
				[helpText(options.topic)],
				'admanager help',
			)
			return EXIT_OK
		}
		default: {
			const _exhaustive: never = options
			return _exhaustive
		}
	}
}

/** Run the CLI and return an exit code for process exit. */
export async function runCli(
	argv: readonly string[],
	deps: CommandDeps = defaultDeps,
): Promise<ExitCode> {
	const parsed = parseCli(argv)
	if (!parsed.ok) {
		const ctx: OutputContext = {
			json: parsed.json,
			quiet: parsed.quiet,
			logLevel: 'silent',
			progressMode: parsed.json || parsed.quiet ? 'off' : 'static',
			eventsConfig: resolveEventsConfig(),
		}
		writeError(
			ctx,
			parsed.message,
			parsed.errorCode,
			'UsageError',
			parsed.context,
		)
		if (!ctx.json && !ctx.quiet) {
			process.stderr.write(`${parsed.output}\n`)
		}
		return parsed.exitCode
	}

	const options = parsed.options
	const ctx: OutputContext = {
		json: options.json,
		quiet: options.quiet,
		logLevel: options.logLevel,
		progressMode: options.progressMode,
		eventsConfig: options.eventsConfig,
	}

	return await withContext({ runId: randomUUID() }, async () => {
		const startTime = Date.now()
		const mode = resolveMode(ctx)
		try {
			setupLogging(ctx)
			cliLogger.info('CLI started: {command}', {
				command: options.command,
			})
			emitEvent(ctx.eventsConfig, 'admanager-cli-started', {
				command: options.command,
				mode,
			})
			cliLogger.debug('Parsed options: {options}', {
				options: sanitizeCliOptions(options),
			})
			const exitCode = await dispatch(ctx, options, deps)
			const durationMs = Date.now() - startTime
			cliLogger.info(
				'CLI completed: {command} exitCode={exitCode} duration={durationMs}ms',
				{
					command: options.command,
					exitCode,
					durationMs,
				},
			)
			emitEvent(ctx.eventsConfig, 'admanager-cli-completed', {
				command: options.command,
				exitCode,
				durationMs,
				mode,
			})
			return exitCode
		} catch (err) {
			const durationMs = Date.now() - startTime
			if (err instanceof Error && err.name === 'AbortError') {
				cliLogger.info('CLI interrupted: {command} duration={durationMs}ms', {
					command: options.command,
					durationMs,
				})
				emitEvent(ctx.eventsConfig, 'admanager-cli-completed', {
					command: options.command,
					exitCode: EXIT_INTERRUPTED,
					durationMs,
					mode,
				})
				return EXIT_INTERRUPTED
			}
			const rawMessage = err instanceof Error ? err.message : String(err)
			const message = sanitizeErrorMessage(rawMessage)
			cliLogger.error(
				'CLI failed: {command} error={error} duration={durationMs}ms',
				{
					command: options.command,
					error: message,
					durationMs,
				},
			)
			writeError(ctx, message, 'E_RUNTIME', 'RuntimeError')
			emitEvent(ctx.eventsConfig, 'admanager-cli-completed', {
				command: options.command,
				exitCode: EXIT_RUNTIME,
				durationMs,
				mode,
			})
			return EXIT_RUNTIME
		} finally {
			await shutdownLogging()
		}
	})
}

/** Execute the CLI. */
export async function main(): Promise<void> {
	process.once('SIGINT', () => {
		void shutdownLogging()
	})
	const code = await runCli(process.argv)
	process.exit(code)
}

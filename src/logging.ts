import { AsyncLocalStorage } from 'node:async_hooks'
import {
	configure,
	defaultTextFormatter,
	dispose,
	fingersCrossed,
	getLogger,
	jsonLinesFormatter,
	type LogRecord,
	type Sink,
	type TextFormatter,
} from '@logtape/logtape'

type LogLevel = 'silent' | 'info' | 'debug'

type LogContext = {
	readonly runId: string
}

interface LoggingOptions {
	readonly json: boolean
	readonly quiet: boolean
	readonly logLevel: LogLevel
}

let loggingConfigured = false
const logContext = new AsyncLocalStorage<Record<string, unknown>>()

function resolveLogLevel(level: LogLevel): 'warning' | 'info' | 'debug' {
	if (level === 'debug') return 'debug'
	if (level === 'info') return 'info'
	return 'warning'
}

function shouldUseJsonLogs(options: LoggingOptions): boolean {
	if (process.env.ADMANAGER_LOG_FORMAT === 'text') return false
	if (process.env.ADMANAGER_LOG_FORMAT === 'json') return true
	if (options.json) return true
	return !process.stderr.isTTY
}

function shouldUseFingersCrossed(options: LoggingOptions): boolean {
	return (
		process.env.ADMANAGER_LOG_FORMAT !== 'json' &&
		!options.json &&
		!options.quiet &&
		options.logLevel === 'silent'
	)
}

/** Sink writing formatted records to stderr; stdout is reserved for command output. */
function getStderrSink(formatter: TextFormatter): Sink {
	return (record: LogRecord) => {
		process.stderr.write(formatter(record))
	}
}

/** Configure LogTape logging for the CLI. */
export function setupLogging(options: LoggingOptions): void {
	if (loggingConfigured) return
	const baseSink = getStderrSink(
		shouldUseJsonLogs(options) ? jsonLinesFormatter : defaultTextFormatter,
	)
	const sink = shouldUseFingersCrossed(options)
		? fingersCrossed(baseSink, {
				triggerLevel: 'error',
				maxBufferSize: 500,
			})
		: baseSink

	void configure({
		reset: true,
		contextLocalStorage: logContext,
		sinks: {
			stderr: sink,
		},
		loggers: [
			{
				category: ['logtape', 'meta'],
				sinks: ['stderr'],
				lowestLevel: 'warning',
			},
			{
				category: ['admanager'],
				sinks: ['stderr'],
				lowestLevel: resolveLogLevel(options.logLevel),
			},
		],
	}).catch((err: unknown) => {
		console.error('[admanager] Failed to configure logging:', err)
	})

	loggingConfigured = true
}

/** Shut down logging safely (idempotent). Flushes sinks with a timeout. */
export async function shutdownLogging(): Promise<void> {
	if (!loggingConfigured) return
	loggingConfigured = false
	const timeoutMs = 500
	await Promise.race([
		dispose(),
		new Promise<void>((resolve) => setTimeout(resolve, timeoutMs)),
	])
}

/** Get a namespaced logger under the admanager root category. */
export function getAdManagerLogger(
	category: string[],
): ReturnType<typeof getLogger> {
	return getLogger(['admanager', ...category])
}

/** Run a function with a scoped logging context. */
export async function withContext<T>(
	context: LogContext,
	fn: () => Promise<T> | T,
): Promise<T> {
	return await logContext.run(context, async () => await fn())
}

/** Read the current logging context (if any). */
export function getLogContext(): LogContext | null {
	const runId = logContext.getStore()?.runId
	return typeof runId === 'string' ? { runId } : null
}

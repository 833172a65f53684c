import type { EventsConfig } from '../events'
import {
	AuthenticationError,
	ConfigError,
	StructuredError,
	SubmissionError,
} from '../gam/errors'
import { PqlInjectionError } from '../gam/pql'

/** Standard exit codes for the CLI process. */
export const EXIT_OK = 0 as const
export const EXIT_RUNTIME = 1 as const
export const EXIT_USAGE = 2 as const
export const EXIT_NOT_FOUND = 3 as const
export const EXIT_UNAUTHORIZED = 4 as const
export const EXIT_CONFLICT = 5 as const
export const EXIT_INTERRUPTED = 130 as const

/** Union of all valid CLI exit codes. */
export type ExitCode = 0 | 1 | 2 | 3 | 4 | 5 | 130

/** Schema version embedded in all JSON output envelopes. */
const SCHEMA_VERSION_OUTPUT = 1

type LogLevel = 'silent' | 'info' | 'debug'
export type ProgressMode = 'animated' | 'static' | 'off'

/** Shared context threaded through every command for output formatting. */
export interface OutputContext {
	readonly json: boolean
	readonly quiet: boolean
	readonly logLevel: LogLevel
	readonly progressMode: ProgressMode
	readonly eventsConfig: EventsConfig
}

/**
 * Map error codes to action hints for agents.
 * Used by writeError to populate the `action` and `retryable` fields
 * in JSON error output.
 */
export const ERROR_CODE_ACTIONS: Record<
	string,
	{ action: string; retryable: boolean }
> = {
	E_NETWORK: { action: 'CHECK_NETWORK', retryable: true },
	E_SERVER_ERROR: { action: 'RETRY_WITH_BACKOFF', retryable: true },
	E_API_ERROR: { action: 'INSPECT_API_ERRORS', retryable: false },
	E_INVALID_RESPONSE: { action: 'ESCALATE', retryable: false },
	E_PAGINATION_STALLED: { action: 'RETRY', retryable: true },
	E_RUNTIME: { action: 'ESCALATE', retryable: false },
	E_USAGE: { action: 'FIX_ARGS', retryable: false },
	E_CONFIG: { action: 'FIX_CONFIG', retryable: false },
	E_INSECURE_CREDENTIALS: { action: 'FIX_PERMISSIONS', retryable: false },
	E_NOT_FOUND: { action: 'CHECK_NAME', retryable: false },
	E_UNAUTHORIZED: { action: 'CHECK_CREDENTIALS', retryable: false },
	E_MALFORMED_CREDENTIAL: { action: 'CHECK_CREDENTIALS', retryable: false },
	E_CREDENTIAL_REJECTED: { action: 'CHECK_CREDENTIALS', retryable: false },
	E_SUBMISSION_REJECTED: { action: 'RETRY_WITH_BATCH_SIZE_1', retryable: false },
	E_REPORT_FAILED: { action: 'RETRY', retryable: true },
	E_INCOMPATIBLE_QUERY: { action: 'RESAVE_QUERY', retryable: false },
	E_EMPTY_REPORT: { action: 'NONE', retryable: false },
	E_CONFLICT: { action: 'USE_EXISTING', retryable: false },
}

/** Write successful output in JSON or human mode. */
export function writeSuccess<T>(
	ctx: OutputContext,
	data: T,
	humanLines: string[],
	quietLine: string,
	warnings?: readonly string[],
): void {
	const activeWarnings = warnings && warnings.length > 0 ? warnings : undefined
	if (ctx.json) {
		const envelope: Record<string, unknown> = {
			status: 'data',
			schemaVersion: SCHEMA_VERSION_OUTPUT,
			data,
		}
		if (activeWarnings) envelope.warnings = activeWarnings
		process.stdout.write(`${JSON.stringify(envelope)}\n`)
		return
	}
	if (activeWarnings) {
		for (const w of activeWarnings) {
			process.stderr.write(`Warning: ${w}\n`)
		}
	}
	if (ctx.quiet) {
		process.stdout.write(`${quietLine}\n`)
		return
	}
	process.stdout.write(`${humanLines.join('\n')}\n`)
}

/** Write structured errors to stderr (JSON in machine mode). */
export function writeError(
	ctx: OutputContext,
	message: string,
	errorCode: string,
	errorName: string,
	context?: Record<string, unknown>,
): void {
	const sanitized = sanitizeErrorMessage(message)
	if (ctx.json) {
		const fallback = { action: 'ESCALATE', retryable: false }
		const action = ERROR_CODE_ACTIONS[errorCode] ?? fallback
		const errorPayload: Record<string, unknown> = {
			name: errorName,
			code: errorCode,
			action: action.action,
			retryable: action.retryable,
		}
		if (context) errorPayload.context = context
		process.stderr.write(
			`${JSON.stringify({
				status: 'error',
				message: sanitized,
				error: errorPayload,
			})}\n`,
		)
		return
	}
	const line = ctx.quiet ? sanitized : `[admanager] ${sanitized}`
	process.stderr.write(`${line}\n`)
}

/**
 * Sanitize error messages to prevent token/secret leakage in output.
 * Redacts bearer tokens, OAuth params and service-account key material.
 */
export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(
			/-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
			'[REDACTED PRIVATE KEY]',
		)
		.replace(/"private_key"\s*:\s*"[^"]*"/gi, '"private_key":"[REDACTED]"')
		.replace(/Bearer\s+[A-Za-z0-9._-]+/gi, 'Bearer [REDACTED]')
		.replace(/access_token=[^&\s]+/gi, 'access_token=[REDACTED]')
		.replace(/refresh_token=[^&\s]+/gi, 'refresh_token=[REDACTED]')
		.replace(/assertion=[^&\s]+/gi, 'assertion=[REDACTED]')
}

/**
 * Standardized error catch handler for command functions.
 * Maps structured errors to exit codes and writes consistent agent
 * error metadata. Sanitizes all messages.
 */
export function handleCommandError(ctx: OutputContext, err: unknown): ExitCode {
	if (err instanceof AuthenticationError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return EXIT_UNAUTHORIZED
	}
	if (err instanceof ConfigError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return EXIT_USAGE
	}
	if (err instanceof PqlInjectionError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return EXIT_USAGE
	}
	if (err instanceof SubmissionError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return EXIT_CONFLICT
	}
	if (err instanceof StructuredError) {
		writeError(ctx, err.message, err.code, err.name, err.context)
		return EXIT_RUNTIME
	}
	writeError(
		ctx,
		err instanceof Error ? err.message : String(err),
		'E_RUNTIME',
		'RuntimeError',
	)
	return EXIT_RUNTIME
}

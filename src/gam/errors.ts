type ErrorCategory = 'auth' | 'api' | 'submission' | 'config' | 'runtime'

interface StructuredErrorOptions {
	readonly code: string
	readonly category: ErrorCategory
	readonly recoverable: boolean
	readonly context?: Record<string, unknown>
	readonly cause?: unknown
}

/** Base structured error for admanager-toolkit (machine-readable fields). */
export class StructuredError extends Error {
	readonly code: string
	readonly category: ErrorCategory
	readonly recoverable: boolean
	readonly context?: Record<string, unknown>

	constructor(message: string, options: StructuredErrorOptions) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause })
		this.name = 'StructuredError'
		this.code = options.code
		this.category = options.category
		this.recoverable = options.recoverable
		this.context = options.context
	}
}

/** Credential is malformed, rejected by the token endpoint, or refused by the API. */
export class AuthenticationError extends StructuredError {
	constructor(
		message: string,
		options?: Partial<Omit<StructuredErrorOptions, 'category'>>,
	) {
		super(message, {
			code: options?.code ?? 'E_UNAUTHORIZED',
			category: 'auth',
			recoverable: options?.recoverable ?? false,
			context: options?.context,
			cause: options?.cause,
		})
		this.name = 'AuthenticationError'
	}
}

/** A single ApiError entry from a SOAP fault detail. */
export interface ApiErrorDetail {
	readonly reason: string
	readonly fieldPath?: string
	readonly trigger?: string
	readonly errorString?: string
}

/** SOAP faults and transport failures from the Ad Manager API. */
export class AdManagerApiError extends StructuredError {
	readonly status?: number
	readonly apiErrors: readonly ApiErrorDetail[]

	constructor(
		message: string,
		options: Omit<StructuredErrorOptions, 'category'> & {
			status?: number
			apiErrors?: readonly ApiErrorDetail[]
		},
	) {
		super(message, {
			code: options.code,
			category: 'api',
			recoverable: options.recoverable,
			context: options.context,
			cause: options.cause,
		})
		this.name = 'AdManagerApiError'
		this.status = options.status
		this.apiErrors = options.apiErrors ?? []
	}
}

/** A multi-value creation batch was rejected; earlier batches may have been applied. */
export class SubmissionError extends StructuredError {
	constructor(
		message: string,
		options?: Partial<Omit<StructuredErrorOptions, 'category'>>,
	) {
		super(message, {
			code: options?.code ?? 'E_SUBMISSION_REJECTED',
			category: 'submission',
			recoverable: options?.recoverable ?? false,
			context: options?.context,
			cause: options?.cause,
		})
		this.name = 'SubmissionError'
	}
}

/** Missing or invalid environment, flags or credential file. */
export class ConfigError extends StructuredError {
	constructor(
		message: string,
		options?: Partial<Omit<StructuredErrorOptions, 'category'>>,
	) {
		super(message, {
			code: options?.code ?? 'E_CONFIG',
			category: 'config',
			recoverable: options?.recoverable ?? false,
			context: options?.context,
			cause: options?.cause,
		})
		this.name = 'ConfigError'
	}
}

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { assertSecureFile } from '../util/fs'
import { ConfigError } from './errors'

export const DEFAULT_APPLICATION_NAME = 'admanager-toolkit'
export const DEFAULT_API_VERSION = 'v202508'
export const DEFAULT_API_BASE_URL = 'https://ads.google.com/apis/ads/publisher'
const DEFAULT_TIMEOUT_MS = 120_000

const NetworkCodeSchema = z.coerce
	.number({ invalid_type_error: 'network code must be a number' })
	.int('network code must be an integer')
	.positive('network code must be positive')

const ApiVersionSchema = z
	.string()
	.regex(/^v\d{6}$/, 'API version must look like v202508')

const EnvSchema = z.object({
	ADMANAGER_NETWORK_CODE: NetworkCodeSchema.optional(),
	ADMANAGER_CREDENTIALS: z.string().min(1).optional(),
	ADMANAGER_APPLICATION_NAME: z.string().min(1).default(DEFAULT_APPLICATION_NAME),
	ADMANAGER_API_VERSION: ApiVersionSchema.default(DEFAULT_API_VERSION),
	ADMANAGER_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
	ADMANAGER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
})

/**
 * Service-account credential as downloaded from Google Cloud. Only the
 * fields needed to mint tokens are required; the rest pass through.
 */
export const ServiceAccountKeySchema = z
	.object({
		type: z.string().optional(),
		private_key: z.string().min(1, 'private_key is required'),
		client_email: z.string().email('client_email must be an email address'),
		token_uri: z.string().url('token_uri must be a URL'),
	})
	.passthrough()

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>

export interface EnvConfig {
	readonly networkCode: number | null
	readonly credentialsPath: string | null
	readonly applicationName: string
	readonly apiVersion: string
	readonly apiBaseUrl: string
	readonly timeoutMs: number
}

function blankToUndefined(value: string | undefined): string | undefined {
	return value && value.trim().length > 0 ? value : undefined
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join('.')}: ${issue.message}`
				: issue.message,
		)
		.join('; ')
}

let cachedEnvConfig: EnvConfig | null = null

/**
 * Load toolkit configuration from process.env.
 * Result is cached after the first successful call since env vars
 * do not change during a CLI invocation.
 */
export function loadEnvConfig(): EnvConfig {
	if (cachedEnvConfig) return cachedEnvConfig
	const env = process.env
	const result = EnvSchema.safeParse({
		ADMANAGER_NETWORK_CODE: blankToUndefined(env.ADMANAGER_NETWORK_CODE),
		ADMANAGER_CREDENTIALS: blankToUndefined(env.ADMANAGER_CREDENTIALS),
		ADMANAGER_APPLICATION_NAME: blankToUndefined(env.ADMANAGER_APPLICATION_NAME),
		ADMANAGER_API_VERSION: blankToUndefined(env.ADMANAGER_API_VERSION),
		ADMANAGER_API_BASE_URL: blankToUndefined(env.ADMANAGER_API_BASE_URL),
		ADMANAGER_TIMEOUT_MS: blankToUndefined(env.ADMANAGER_TIMEOUT_MS),
	})
	if (!result.success) {
		throw new ConfigError(`Invalid env config: ${formatIssues(result.error)}`, {
			code: 'E_CONFIG',
		})
	}
	cachedEnvConfig = {
		networkCode: result.data.ADMANAGER_NETWORK_CODE ?? null,
		credentialsPath: result.data.ADMANAGER_CREDENTIALS ?? null,
		applicationName: result.data.ADMANAGER_APPLICATION_NAME,
		apiVersion: result.data.ADMANAGER_API_VERSION,
		apiBaseUrl: result.data.ADMANAGER_API_BASE_URL,
		timeoutMs: result.data.ADMANAGER_TIMEOUT_MS,
	}
	return cachedEnvConfig
}

/** Reset the cached env config (for testing). */
export function resetEnvConfigCache(): void {
	cachedEnvConfig = null
}

/** Parse a network code supplied on the command line. */
export function parseNetworkCode(raw: string): number {
	const result = NetworkCodeSchema.safeParse(raw)
	if (!result.success) {
		throw new ConfigError(`Invalid network code: ${formatIssues(result.error)}`, {
			code: 'E_USAGE',
			context: { networkCode: raw },
		})
	}
	return result.data
}

/** Validate an in-memory credential object. */
export function parseServiceAccountKey(raw: unknown) {
	return ServiceAccountKeySchema.safeParse(raw)
}

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Read a service-account key file. Refuses symlinks and files readable by
 * group or others, since the file holds a private key.
 */
export async function loadServiceAccountKey(
	keyPath: string,
): Promise<ServiceAccountKey> {
	try {
		assertSecureFile(keyPath)
	} catch (err) {
		if (isMissingFile(err)) {
			throw new ConfigError(`Credential file not found: ${keyPath}`, {
				code: 'E_CONFIG',
				context: { path: keyPath },
				cause: err,
			})
		}
		throw new ConfigError(err instanceof Error ? err.message : String(err), {
			code: 'E_INSECURE_CREDENTIALS',
			context: { path: keyPath },
			cause: err,
		})
	}
	const raw = await readFile(keyPath, 'utf8')
	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch (err) {
		throw new ConfigError('Credential file is not valid JSON', {
			code: 'E_CONFIG',
			context: { path: keyPath },
			cause: err,
		})
	}
	const parsed = parseServiceAccountKey(json)
	if (!parsed.success) {
		throw new ConfigError(
			`Invalid credential file: ${formatIssues(parsed.error)}`,
			{ code: 'E_CONFIG', context: { path: keyPath } },
		)
	}
	return parsed.data
}

import { GoogleAuth } from 'google-auth-library'
import { getAdManagerLogger } from '../logging'
import { writeTransientFile } from '../util/fs'
import {
	DEFAULT_API_BASE_URL,
	DEFAULT_API_VERSION,
	DEFAULT_APPLICATION_NAME,
	parseServiceAccountKey,
} from './config'
import { AuthenticationError } from './errors'

/** OAuth scope for the Ad Manager API. */
export const AD_MANAGER_SCOPE = 'https://www.googleapis.com/auth/dfp'
const DEFAULT_TIMEOUT_MS = 120_000

const sessionLogger = getAdManagerLogger(['session'])

/**
 * An authenticated handle bound to one network. Read-only after
 * construction; pass it to the gateway factories in `./soap`.
 */
export interface Session {
	readonly networkCode: number
	readonly applicationName: string
	readonly apiVersion: string
	readonly apiBaseUrl: string
	readonly timeoutMs: number
	readonly serviceAccountEmail: string
	/** Current bearer token; refreshed by the auth client when it expires. */
	getAccessToken(): Promise<string>
}

export interface ConnectOptions {
	readonly applicationName?: string
	readonly apiVersion?: string
	readonly apiBaseUrl?: string
	readonly timeoutMs?: number
	/** Parent directory for the transient key file (defaults to the OS temp dir). */
	readonly tmpDir?: string
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

async function requireToken(auth: GoogleAuth): Promise<string> {
	const token = await auth.getAccessToken()
	if (!token) {
		throw new AuthenticationError('Token endpoint returned no access token', {
			code: 'E_CREDENTIAL_REJECTED',
		})
	}
	return token
}

/**
 * Exchange a service-account credential for a session on `networkCode`.
 *
 * The credential is written to a transient owner-only key file because
 * that is the input GoogleAuth loads service accounts from; the file and
 * its directory are removed before this function returns, whether or not
 * authentication succeeded.
 */
export async function connect(
	credential: unknown,
	networkCode: number,
	options: ConnectOptions = {},
): Promise<Session> {
	const parsed = parseServiceAccountKey(credential)
	if (!parsed.success) {
		throw new AuthenticationError('Malformed service account credential', {
			code: 'E_MALFORMED_CREDENTIAL',
			context: {
				issues: parsed.error.issues.map((issue) => issue.path.join('.')),
			},
		})
	}
	const key = parsed.data
	if (!Number.isSafeInteger(networkCode) || networkCode <= 0) {
		throw new AuthenticationError('Network code must be a positive integer', {
			code: 'E_MALFORMED_CREDENTIAL',
			context: { networkCode },
		})
	}

	const keyFile = await writeTransientFile(
		'service-account.json',
		JSON.stringify({ type: 'service_account', ...key }),
		options.tmpDir,
	)
	const auth = new GoogleAuth({
		keyFile: keyFile.path,
		scopes: [AD_MANAGER_SCOPE],
	})
	try {
		await requireToken(auth)
	} catch (err) {
		sessionLogger.warn('Authentication failed for {serviceAccount}: {error}', {
			serviceAccount: key.client_email,
			error: describe(err),
		})
		if (err instanceof AuthenticationError) throw err
		throw new AuthenticationError(`Credential rejected: ${describe(err)}`, {
			code: 'E_CREDENTIAL_REJECTED',
			context: { serviceAccount: key.client_email },
			cause: err,
		})
	} finally {
		await keyFile.dispose()
	}

	sessionLogger.info('Session established for {serviceAccount} on network {networkCode}', {
		serviceAccount: key.client_email,
		networkCode,
	})

	return {
		networkCode,
		applicationName: options.applicationName ?? DEFAULT_APPLICATION_NAME,
		apiVersion: options.apiVersion ?? DEFAULT_API_VERSION,
		apiBaseUrl: options.apiBaseUrl ?? DEFAULT_API_BASE_URL,
		timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		serviceAccountEmail: key.client_email,
		getAccessToken: async () => {
			try {
				return await requireToken(auth)
			} catch (err) {
				if (err instanceof AuthenticationError) throw err
				throw new AuthenticationError(`Token refresh failed: ${describe(err)}`, {
					code: 'E_CREDENTIAL_REJECTED',
					recoverable: true,
					cause: err,
				})
			}
		},
	}
}

import { loadServiceAccountKey, type ServiceAccountKey } from '../../gam/config'
import { AuthenticationError } from '../../gam/errors'
import { connect } from '../../gam/session'
import { type ConnectionFlags, resolveConnection, type ResolvedConnection } from '../connection'
import type { ExitCode, OutputContext } from '../output'
import { EXIT_OK, EXIT_UNAUTHORIZED, EXIT_USAGE, writeSuccess } from '../output'

interface StatusCheck {
	readonly name: string
	readonly status: 'ok' | 'warning' | 'error'
	readonly message?: string
}

interface StatusData {
	readonly command: 'status'
	readonly checks: StatusCheck[]
	readonly networkCode: number | null
	readonly serviceAccount: string | null
	readonly diagnosis: 'ok' | 'invalid-config' | 'invalid-credentials' | 'auth-failed'
	readonly nextAction: 'NONE' | 'FIX_CONFIG' | 'CHECK_CREDENTIALS'
}

export interface StatusCommand {
	readonly command: 'status'
	readonly connection: ConnectionFlags
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

/** Check configuration, credential file and token exchange. */
export async function runStatus(
	ctx: OutputContext,
	options: StatusCommand,
): Promise<ExitCode> {
	const checks: StatusCheck[] = []
	let diagnosis: StatusData['diagnosis'] = 'ok'

	let resolved: ResolvedConnection | null = null
	try {
		resolved = resolveConnection(options.connection)
		checks.push({ name: 'config', status: 'ok' })
	} catch (err) {
		diagnosis = 'invalid-config'
		checks.push({ name: 'config', status: 'error', message: describe(err) })
	}

	let key: ServiceAccountKey | null = null
	if (resolved) {
		try {
			key = await loadServiceAccountKey(resolved.credentialsPath)
			checks.push({ name: 'credentials', status: 'ok' })
		} catch (err) {
			diagnosis = 'invalid-credentials'
			checks.push({ name: 'credentials', status: 'error', message: describe(err) })
		}
	}

	if (resolved && key) {
		try {
			await connect(key, resolved.networkCode, {
				applicationName: resolved.env.applicationName,
				apiVersion: resolved.env.apiVersion,
				apiBaseUrl: resolved.env.apiBaseUrl,
				timeoutMs: resolved.env.timeoutMs,
			})
			checks.push({ name: 'auth', status: 'ok' })
		} catch (err) {
			if (!(err instanceof AuthenticationError)) throw err
			diagnosis = 'auth-failed'
			checks.push({ name: 'auth', status: 'error', message: err.message })
		}
	}

	const nextAction: StatusData['nextAction'] =
		diagnosis === 'ok'
			? 'NONE'
			: diagnosis === 'invalid-config'
				? 'FIX_CONFIG'
				: 'CHECK_CREDENTIALS'
	const data: StatusData = {
		command: 'status',
		checks,
		networkCode: resolved?.networkCode ?? null,
		serviceAccount: key?.client_email ?? null,
		diagnosis,
		nextAction,
	}
	const humanLines = [
		`Status: ${diagnosis}`,
		...checks.map((check) =>
			check.message
				? `  ${check.name}: ${check.status} (${check.message})`
				: `  ${check.name}: ${check.status}`,
		),
	]
	if (data.networkCode !== null) humanLines.push(`Network: ${data.networkCode}`)
	writeSuccess(ctx, data, humanLines, diagnosis)

	if (diagnosis === 'ok') return EXIT_OK
	return diagnosis === 'invalid-config' ? EXIT_USAGE : EXIT_UNAUTHORIZED
}

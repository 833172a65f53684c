import {
	type EnvConfig,
	loadEnvConfig,
	loadServiceAccountKey,
	parseNetworkCode,
} from '../gam/config'
import { ConfigError } from '../gam/errors'
import type { CustomTargetingGateway, ReportGateway } from '../gam/gateway'
import { connect, type Session } from '../gam/session'
import { createCustomTargetingGateway, createReportGateway } from '../gam/soap'
import type { OutputContext } from './output'

/** `--credentials` / `--network` as given on the command line. */
export interface ConnectionFlags {
	readonly credentialsPath: string | null
	readonly networkCode: string | null
}

export interface ResolvedConnection {
	readonly credentialsPath: string
	readonly networkCode: number
	readonly env: EnvConfig
}

/** Flags win over ADMANAGER_CREDENTIALS / ADMANAGER_NETWORK_CODE. */
export function resolveConnection(flags: ConnectionFlags): ResolvedConnection {
	const env = loadEnvConfig()
	const credentialsPath = flags.credentialsPath ?? env.credentialsPath
	if (!credentialsPath) {
		throw new ConfigError(
			'Missing credentials: pass --credentials <file> or set ADMANAGER_CREDENTIALS',
			{ code: 'E_CONFIG' },
		)
	}
	const networkCode =
		flags.networkCode !== null ? parseNetworkCode(flags.networkCode) : env.networkCode
	if (networkCode === null) {
		throw new ConfigError(
			'Missing network code: pass --network <code> or set ADMANAGER_NETWORK_CODE',
			{ code: 'E_CONFIG' },
		)
	}
	return { credentialsPath, networkCode, env }
}

/** Load the key file and authenticate. */
export async function openSession(flags: ConnectionFlags): Promise<Session> {
	const resolved = resolveConnection(flags)
	const key = await loadServiceAccountKey(resolved.credentialsPath)
	return await connect(key, resolved.networkCode, {
		applicationName: resolved.env.applicationName,
		apiVersion: resolved.env.apiVersion,
		apiBaseUrl: resolved.env.apiBaseUrl,
		timeoutMs: resolved.env.timeoutMs,
	})
}

/** How commands reach Ad Manager; tests substitute in-memory gateways. */
export interface CommandDeps {
	openTargeting(
		ctx: OutputContext,
		flags: ConnectionFlags,
	): Promise<CustomTargetingGateway>
	openReports(ctx: OutputContext, flags: ConnectionFlags): Promise<ReportGateway>
}

export const defaultDeps: CommandDeps = {
	async openTargeting(ctx, flags) {
		const session = await openSession(flags)
		return createCustomTargetingGateway(session, { eventsConfig: ctx.eventsConfig })
	},
	async openReports(ctx, flags) {
		const session = await openSession(flags)
		return createReportGateway(session, { eventsConfig: ctx.eventsConfig })
	},
}

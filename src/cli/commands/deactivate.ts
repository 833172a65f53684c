import { emitEvent } from '../../events'
import { deactivateValues } from '../../gam/targeting'
import { type CommandDeps, type ConnectionFlags, defaultDeps } from '../connection'
import { readCandidateValues, type ValueSourceFlags } from '../input'
import type { ExitCode, OutputContext } from '../output'
import {
	EXIT_NOT_FOUND,
	EXIT_OK,
	handleCommandError,
	writeError,
	writeSuccess,
} from '../output'

export interface DeactivateCommand {
	readonly command: 'deactivate'
	readonly connection: ConnectionFlags
	readonly keyName: string
	readonly source: ValueSourceFlags
	readonly execute: boolean
}

/** Deactivate the listed values of a key; dry run by default. */
export async function runDeactivate(
	ctx: OutputContext,
	options: DeactivateCommand,
	deps: CommandDeps = defaultDeps,
	stdin?: AsyncIterable<Buffer | string>,
): Promise<ExitCode> {
	try {
		const candidates = await readCandidateValues(options.source, stdin)
		const api = await deps.openTargeting(ctx, options.connection)
		const result = await deactivateValues(api, options.keyName, candidates, {
			dryRun: !options.execute,
		})
		if (!result.ok) {
			writeError(ctx, `Key not found: ${result.keyName}`, 'E_NOT_FOUND', 'NotFoundError', {
				keyName: result.keyName,
			})
			return EXIT_NOT_FOUND
		}
		const mode = options.execute ? 'execute' : 'dry-run'
		if (options.execute) {
			emitEvent(ctx.eventsConfig, 'admanager-deactivate-completed', {
				keyName: result.key.name,
				deactivated: result.deactivated.length,
				notFound: result.notFound.length,
			})
		}
		const verb = options.execute ? 'Deactivated' : 'Would deactivate'
		writeSuccess(
			ctx,
			{
				command: 'deactivate',
				mode,
				keyName: result.key.name,
				keyId: result.key.id,
				deactivated: result.deactivated,
				notFound: result.notFound,
			},
			[
				`${verb} ${result.deactivated.length} values of ${result.key.name}`,
				...result.deactivated.map((value) => `  - ${value}`),
				...(options.execute ? [] : ['Re-run with --execute to apply.']),
			],
			String(result.deactivated.length),
			result.notFound.length > 0
				? [`Not found: ${result.notFound.join(', ')}`]
				: undefined,
		)
		return EXIT_OK
	} catch (err) {
		return handleCommandError(ctx, err)
	}
}

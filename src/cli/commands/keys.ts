import { getAdManagerLogger } from '../../logging'
import {
	createKey,
	findKeyByName,
	getCurrentValues,
} from '../../gam/targeting'
import { type CommandDeps, type ConnectionFlags, defaultDeps } from '../connection'
import type { ExitCode, OutputContext } from '../output'
import {
	EXIT_CONFLICT,
	EXIT_NOT_FOUND,
	EXIT_OK,
	handleCommandError,
	writeError,
	writeSuccess,
} from '../output'
import { ProgressDisplay } from '../progress'

const keysLogger = getAdManagerLogger(['cli', 'keys'])

export interface KeyCommand {
	readonly command: 'key'
	readonly connection: ConnectionFlags
	readonly keyName: string
}

export interface CreateKeyCommand {
	readonly command: 'create-key'
	readonly connection: ConnectionFlags
	readonly keyName: string
}

export interface ValuesCommand {
	readonly command: 'values'
	readonly connection: ConnectionFlags
	readonly keyName: string
	readonly displayNames: boolean
}

function writeKeyNotFound(ctx: OutputContext, keyName: string): ExitCode {
	writeError(ctx, `Key not found: ${keyName}`, 'E_NOT_FOUND', 'NotFoundError', {
		keyName,
	})
	return EXIT_NOT_FOUND
}

/** Look up a key by exact name. */
export async function runKey(
	ctx: OutputContext,
	options: KeyCommand,
	deps: CommandDeps = defaultDeps,
): Promise<ExitCode> {
	try {
		const api = await deps.openTargeting(ctx, options.connection)
		const key = await findKeyByName(api, options.keyName)
		if (!key) return writeKeyNotFound(ctx, options.keyName)
		writeSuccess(
			ctx,
			{ command: 'key', key },
			[`Key ${key.name} (id ${key.id}, ${key.type})`],
			String(key.id),
		)
		return EXIT_OK
	} catch (err) {
		return handleCommandError(ctx, err)
	}
}

/** Create a FREEFORM key; an existing key of that name is a conflict. */
export async function runCreateKey(
	ctx: OutputContext,
	options: CreateKeyCommand,
	deps: CommandDeps = defaultDeps,
): Promise<ExitCode> {
	try {
		const api = await deps.openTargeting(ctx, options.connection)
		const existing = await findKeyByName(api, options.keyName)
		if (existing) {
			writeError(
				ctx,
				`Key already exists: ${existing.name} (id ${existing.id})`,
				'E_CONFLICT',
				'ConflictError',
				{ keyName: existing.name, keyId: existing.id },
			)
			return EXIT_CONFLICT
		}
		const key = await createKey(api, options.keyName)
		writeSuccess(
			ctx,
			{ command: 'create-key', key },
			[`Created key ${key.name} (id ${key.id})`],
			String(key.id),
		)
		return EXIT_OK
	} catch (err) {
		return handleCommandError(ctx, err)
	}
}

/** List every value of a key. */
export async function runValues(
	ctx: OutputContext,
	options: ValuesCommand,
	deps: CommandDeps = defaultDeps,
): Promise<ExitCode> {
	const progress = new ProgressDisplay(ctx.progressMode)
	try {
		const api = await deps.openTargeting(ctx, options.connection)
		const key = await findKeyByName(api, options.keyName)
		if (!key) return writeKeyNotFound(ctx, options.keyName)
		const values = await getCurrentValues(api, key.id, {
			attribute: options.displayNames ? 'displayName' : 'name',
			onProgress: (percent) => progress.percent('Fetching values', percent),
		})
		progress.finish()
		keysLogger.info('Listed {count} values of {keyName}', {
			count: values.length,
			keyName: key.name,
		})
		writeSuccess(
			ctx,
			{ command: 'values', keyId: key.id, count: values.length, values },
			values.length > 0 ? values : [`Key ${key.name} has no values`],
			String(values.length),
		)
		return EXIT_OK
	} catch (err) {
		progress.finish()
		return handleCommandError(ctx, err)
	}
}

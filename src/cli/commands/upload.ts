import { emitEvent } from '../../events'
import { getAdManagerLogger } from '../../logging'
import {
	DEFAULT_BATCH_SIZE,
	planUpload,
	type SyncProgress,
	uploadNewValues,
} from '../../gam/targeting'
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
import { ProgressDisplay } from '../progress'

const uploadLogger = getAdManagerLogger(['cli', 'upload'])

export interface UploadCommand {
	readonly command: 'upload'
	readonly connection: ConnectionFlags
	readonly keyName: string
	readonly source: ValueSourceFlags
	readonly createKey: boolean
	readonly batchSize: number | null
	readonly keepDuplicates: boolean
	readonly execute: boolean
}

/** Reconcile a key's values against a file or stdin list; dry run by default. */
export async function runUpload(
	ctx: OutputContext,
	options: UploadCommand,
	deps: CommandDeps = defaultDeps,
	stdin?: AsyncIterable<Buffer | string>,
): Promise<ExitCode> {
	const progress = new ProgressDisplay(ctx.progressMode)
	const onProgress = (event: SyncProgress): void => {
		if (event.phase === 'fetch') {
			progress.percent('Fetching values', event.percent)
		} else {
			progress.update(event.batch, event.batches, 'batches submitted')
		}
	}
	try {
		uploadLogger.info('Upload started in {mode} mode', {
			mode: options.execute ? 'execute' : 'dry-run',
			keyName: options.keyName,
			fromFile: options.source.fromFile ?? 'stdin',
		})
		const candidates = await readCandidateValues(options.source, stdin)
		const api = await deps.openTargeting(ctx, options.connection)
		const uploadOptions = {
			createKey: options.createKey,
			batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
			duplicates: options.keepDuplicates ? ('keep' as const) : ('collapse' as const),
			onProgress,
		}

		if (!options.execute) {
			const plan = await planUpload(api, options.keyName, candidates, uploadOptions)
			progress.finish()
			if (!plan.ok) {
				writeError(ctx, `Key not found: ${plan.keyName}`, 'E_NOT_FOUND', 'NotFoundError', {
					keyName: plan.keyName,
					hint: 'Pass --create-key to create it',
				})
				return EXIT_NOT_FOUND
			}
			writeSuccess(
				ctx,
				{
					command: 'upload',
					mode: 'dry-run',
					keyName: plan.keyName,
					keyId: plan.key?.id ?? null,
					keyWouldBeCreated: plan.key === null,
					existingCount: plan.existingCount,
					newValues: plan.newValues,
					batches: plan.batches.length,
				},
				[
					`Dry run for key ${plan.keyName}${plan.key ? '' : ' (would be created)'}`,
					`Existing values: ${plan.existingCount}`,
					`New values: ${plan.newValues.length} in ${plan.batches.length} batches`,
					...plan.newValues.map((value) => `  + ${value}`),
					'Re-run with --execute to apply.',
				],
				String(plan.newValues.length),
			)
			return EXIT_OK
		}

		const result = await uploadNewValues(api, options.keyName, candidates, uploadOptions)
		progress.finish()
		if (!result.ok) {
			writeError(ctx, `Key not found: ${result.keyName}`, 'E_NOT_FOUND', 'NotFoundError', {
				keyName: result.keyName,
				hint: 'Pass --create-key to create it',
			})
			return EXIT_NOT_FOUND
		}
		emitEvent(ctx.eventsConfig, 'admanager-upload-completed', {
			keyName: result.key.name,
			created: result.created.length,
			skipped: result.skipped.length,
			batches: result.batches,
		})
		writeSuccess(
			ctx,
			{
				command: 'upload',
				mode: 'execute',
				keyName: result.key.name,
				keyId: result.key.id,
				keyCreated: result.keyCreated,
				existingCount: result.existingCount,
				created: result.created,
				skipped: result.skipped,
				batches: result.batches,
			},
			[
				`${result.keyCreated ? 'Created key' : 'Key'} ${result.key.name} (id ${result.key.id})`,
				`Uploaded ${result.created.length} new values in ${result.batches} batches`,
				...(result.skipped.length > 0
					? [`Skipped ${result.skipped.length}: ${result.skipped.join(', ')}`]
					: []),
			],
			String(result.created.length),
			result.skipped.length > 0
				? [`${result.skipped.length} values were rejected and skipped`]
				: undefined,
		)
		return EXIT_OK
	} catch (err) {
		progress.finish()
		return handleCommandError(ctx, err)
	}
}

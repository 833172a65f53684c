import { getAdManagerLogger, getLogContext } from '../logging'
import { AdManagerApiError, SubmissionError } from './errors'
import type { CustomTargetingGateway, ValueFilter } from './gateway'
import { importValuesFromTable, uniqueInOrder } from './importers'
import { unsafePqlReason } from './pql'
import type {
	CandidateValues,
	Page,
	PageWindow,
	TargetingKey,
	TargetingValue,
} from './types'

/** Offset step of every paginated query. */
export const PAGE_SIZE = 500
export const DEFAULT_BATCH_SIZE = 200

const targetingLogger = getAdManagerLogger(['targeting'])

export type DuplicatePolicy = 'collapse' | 'keep'

export interface KeyNotFound {
	readonly ok: false
	readonly reason: 'key-not-found'
	readonly keyName: string
}

/** Candidate values minus the remote set, split into submission batches. */
export interface ReconciliationPlan {
	readonly keyName: string
	/** Null when the key does not exist yet and would be created. */
	readonly key: TargetingKey | null
	readonly existingCount: number
	readonly newValues: readonly string[]
	readonly batches: readonly (readonly string[])[]
}

export type PlanResult = ({ readonly ok: true } & ReconciliationPlan) | KeyNotFound

export interface UploadSummary {
	readonly ok: true
	readonly key: TargetingKey
	readonly keyCreated: boolean
	readonly existingCount: number
	readonly created: readonly string[]
	readonly skipped: readonly string[]
	readonly batches: number
}

export type UploadResult = UploadSummary | KeyNotFound

export interface DeactivationSummary {
	readonly ok: true
	readonly key: TargetingKey
	readonly deactivated: readonly string[]
	readonly notFound: readonly string[]
}

export type DeactivationResult = DeactivationSummary | KeyNotFound

export type SyncProgress =
	| { readonly phase: 'fetch'; readonly percent: number }
	| { readonly phase: 'upload'; readonly batch: number; readonly batches: number }

export interface FetchOptions {
	/** Called after each page with the percentage received so far. */
	readonly onProgress?: (percent: number) => void
}

export interface UploadOptions {
	/** Create the key as FREEFORM when it does not exist (default false). */
	readonly createKey?: boolean
	readonly batchSize?: number
	readonly duplicates?: DuplicatePolicy
	readonly onProgress?: (progress: SyncProgress) => void
}

/**
 * Walk an offset-paginated query to the end.
 *
 * Stops once the records received reach the `totalResultSetSize` of the
 * latest page. An empty page before that point throws instead of looping.
 */
export async function paginate<T>(
	fetchPage: (window: PageWindow) => Promise<Page<T>>,
	onPage?: (page: Page<T>, received: number) => Promise<void> | void,
): Promise<T[]> {
	const results: T[] = []
	let offset = 0
	for (;;) {
		const page = await fetchPage({ offset, limit: PAGE_SIZE })
		results.push(...page.results)
		const total = page.totalResultSetSize
		targetingLogger.debug('Fetched page at offset {offset}: {count}/{total}', {
			offset,
			count: results.length,
			total,
		})
		await onPage?.(page, results.length)
		if (results.length >= total) return results
		if (page.results.length === 0) {
			throw new AdManagerApiError(
				`Pagination stalled at offset ${offset}: received ${results.length} of ${total}`,
				{
					code: 'E_PAGINATION_STALLED',
					recoverable: true,
					context: { offset, received: results.length, total },
				},
			)
		}
		offset += PAGE_SIZE
	}
}

function percentOf(received: number, total: number): number {
	if (total <= 0) return 100
	return Math.min(100, Math.round((received / total) * 10_000) / 100)
}

/** Exact-name lookup; names are unique per network. */
export async function findKeyByName(
	api: CustomTargetingGateway,
	name: string,
): Promise<TargetingKey | null> {
	const page = await api.getKeys({ name }, { offset: 0, limit: 1 })
	return page.results.find((key) => key.name === name) ?? null
}

/** Create a FREEFORM key. */
export async function createKey(
	api: CustomTargetingGateway,
	name: string,
): Promise<TargetingKey> {
	const [key] = await api.createKeys([{ name, type: 'FREEFORM' }])
	if (!key) {
		throw new AdManagerApiError(`Key creation returned no key for "${name}"`, {
			code: 'E_INVALID_RESPONSE',
			recoverable: false,
			context: { keyName: name },
		})
	}
	targetingLogger.info('Created key {keyName} ({keyId})', {
		keyName: key.name,
		keyId: key.id,
		...getLogContext(),
	})
	return key
}

/** Every value currently assigned to a key. */
export async function fetchAllValues(
	api: CustomTargetingGateway,
	keyId: number,
	options: FetchOptions = {},
): Promise<TargetingValue[]> {
	return await paginate(
		(window) => api.getValues({ keyId }, window),
		(page, received) => {
			options.onProgress?.(percentOf(received, page.totalResultSetSize))
		},
	)
}

/**
 * Current values of a key projected to `name` (default) or `displayName`.
 * A key given by name that does not resolve yields an empty list.
 */
export async function getCurrentValues(
	api: CustomTargetingGateway,
	key: number | string,
	options: FetchOptions & { readonly attribute?: 'name' | 'displayName' } = {},
): Promise<string[]> {
	let keyId: number
	if (typeof key === 'string') {
		const resolved = await findKeyByName(api, key)
		if (!resolved) return []
		keyId = resolved.id
	} else {
		keyId = key
	}
	const values = await fetchAllValues(api, keyId, options)
	return options.attribute === 'displayName'
		? values.map((value) => value.displayName ?? value.name)
		: values.map((value) => value.name)
}

/** Flatten candidate input to strings. */
export function normalizeCandidates(candidates: CandidateValues): string[] {
	if (candidates.kind === 'list') {
		return candidates.values.map((value) => String(value))
	}
	return importValuesFromTable(candidates.table, {
		column: candidates.column,
		unique: false,
	})
}

/** Candidates absent from `existing` (exact, case-sensitive). */
export function planNewValues(
	candidates: readonly string[],
	existing: Iterable<string>,
	duplicates: DuplicatePolicy = 'collapse',
): string[] {
	const remote = new Set(existing)
	const fresh = candidates.filter((value) => !remote.has(value))
	return duplicates === 'collapse' ? uniqueInOrder(fresh) : fresh
}

/** Consecutive slices of at most `size` items. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
	if (!Number.isInteger(size) || size < 1) {
		throw new RangeError(`Batch size must be a positive integer, got ${size}`)
	}
	const batches: T[][] = []
	for (let start = 0; start < items.length; start += size) {
		batches.push(items.slice(start, start + size))
	}
	return batches
}

function keyNotFound(keyName: string): KeyNotFound {
	targetingLogger.info('Key {keyName} does not exist', {
		keyName,
		...getLogContext(),
	})
	return { ok: false, reason: 'key-not-found', keyName }
}

/**
 * Compute what an upload would submit without mutating anything.
 * With `createKey` a missing key plans against an empty value set.
 */
export async function planUpload(
	api: CustomTargetingGateway,
	keyName: string,
	candidates: CandidateValues,
	options: UploadOptions = {},
): Promise<PlanResult> {
	const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
	const key = await findKeyByName(api, keyName)
	if (!key && !options.createKey) return keyNotFound(keyName)

	const existing = key
		? await getCurrentValues(api, key.id, {
				onProgress: (percent) => options.onProgress?.({ phase: 'fetch', percent }),
			})
		: []
	const newValues = planNewValues(
		normalizeCandidates(candidates),
		existing,
		options.duplicates,
	)
	return {
		ok: true,
		keyName,
		key,
		existingCount: existing.length,
		newValues,
		batches: chunk(newValues, batchSize),
	}
}

/**
 * Create the candidate values a key does not have yet, in sequential batches.
 *
 * A rejected batch aborts with a SubmissionError unless the batch size is 1,
 * in which case the value is skipped. Batches already accepted stay applied.
 */
export async function uploadNewValues(
	api: CustomTargetingGateway,
	keyName: string,
	candidates: CandidateValues,
	options: UploadOptions = {},
): Promise<UploadResult> {
	const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
	// Validate before any remote mutation.
	chunk([], batchSize)

	let key = await findKeyByName(api, keyName)
	let keyCreated = false
	if (!key) {
		if (!options.createKey) return keyNotFound(keyName)
		key = await createKey(api, keyName)
		keyCreated = true
	}

	const existing = await getCurrentValues(api, key.id, {
		onProgress: (percent) => options.onProgress?.({ phase: 'fetch', percent }),
	})
	const newValues = planNewValues(
		normalizeCandidates(candidates),
		existing,
		options.duplicates,
	)
	const batches = chunk(newValues, batchSize)
	targetingLogger.info(
		'Key {keyName} has {existingCount} values; {newCount} new in {batchCount} batches',
		{
			keyName,
			existingCount: existing.length,
			newCount: newValues.length,
			batchCount: batches.length,
			...getLogContext(),
		},
	)

	const created: string[] = []
	const skipped: string[] = []
	for (const [index, batch] of batches.entries()) {
		const keyId = key.id
		try {
			const result = await api.createValues(
				batch.map((name) => ({ customTargetingKeyId: keyId, name })),
			)
			created.push(...result.map((value) => value.name))
			targetingLogger.debug('Submitted batch {batch}/{batches} ({size} values)', {
				batch: index + 1,
				batches: batches.length,
				size: batch.length,
			})
		} catch (err) {
			if (!(err instanceof AdManagerApiError)) throw err
			if (batchSize === 1) {
				targetingLogger.warn('Skipping value {value}: {error}', {
					value: batch[0],
					error: err.message,
					...getLogContext(),
				})
				skipped.push(...batch)
				continue
			}
			throw new SubmissionError(
				`Batch ${index + 1} of ${batches.length} rejected: ${err.message}`,
				{
					context: {
						keyName,
						batchIndex: index,
						batches: batches.length,
						submitted: created.length,
					},
					cause: err,
				},
			)
		} finally {
			options.onProgress?.({
				phase: 'upload',
				batch: index + 1,
				batches: batches.length,
			})
		}
	}

	targetingLogger.info('Uploaded {createdCount} new values for {keyName}', {
		keyName,
		createdCount: created.length,
		skippedCount: skipped.length,
		...getLogContext(),
	})
	return {
		ok: true,
		key,
		keyCreated,
		existingCount: existing.length,
		created,
		skipped,
		batches: batches.length,
	}
}

export interface DeactivateOptions {
	/** Report what would be deactivated without acting on it. */
	readonly dryRun?: boolean
}

/**
 * Deactivate the named values of a key, one action per page of matches.
 * Names with no remote match are reported in `notFound`.
 */
export async function deactivateValues(
	api: CustomTargetingGateway,
	keyName: string,
	candidates: CandidateValues,
	options: DeactivateOptions = {},
): Promise<DeactivationResult> {
	const key = await findKeyByName(api, keyName)
	if (!key) return keyNotFound(keyName)

	const requested = uniqueInOrder(normalizeCandidates(candidates))
	// Names PQL cannot quote are not valid value names, so none exist remotely.
	const queryable = requested.filter((name) => unsafePqlReason(name) === null)
	if (queryable.length === 0) {
		return reportDeactivation(key, requested, new Set())
	}

	const filter: ValueFilter = { keyId: key.id, names: queryable }
	const matched = await paginate(
		(window) => api.getValues(filter, window),
		async (page) => {
			if (options.dryRun || page.results.length === 0) return
			const changed = await api.performValueAction('DELETE', {
				keyId: key.id,
				ids: page.results.map((value) => value.id),
			})
			targetingLogger.debug('Deactivated {changed} values of {keyName}', {
				changed,
				keyName,
			})
		},
	)

	return reportDeactivation(key, requested, new Set(matched.map((value) => value.name)))
}

function reportDeactivation(
	key: TargetingKey,
	requested: readonly string[],
	found: ReadonlySet<string>,
): DeactivationSummary {
	const deactivated = requested.filter((name) => found.has(name))
	const notFound = requested.filter((name) => !found.has(name))
	if (notFound.length > 0) {
		targetingLogger.info('{count} requested values of {keyName} do not exist', {
			count: notFound.length,
			keyName: key.name,
			...getLogContext(),
		})
	}
	return { ok: true, key, deactivated, notFound }
}

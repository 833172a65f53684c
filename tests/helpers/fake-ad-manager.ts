import { AdManagerApiError } from '../../src/gam/errors'
import { keyFilterToWhere, valueFilterToWhere } from '../../src/gam/pql'
import type {
	CustomTargetingGateway,
	KeyFilter,
	ReportGateway,
	TargetingValueAction,
	ValueFilter,
} from '../../src/gam/gateway'
import type {
	ExportFormat,
	NewTargetingValue,
	Page,
	PageWindow,
	ReportJobStatus,
	ReportQuery,
	SavedQuery,
	TargetingKey,
	TargetingKeyType,
	TargetingValue,
} from '../../src/gam/types'

interface FakeTargetingOptions {
	/** Records per page actually returned (defaults to the requested limit). */
	readonly serverPageSize?: number
	/** Return an error to reject a createValues batch. */
	readonly rejectCreate?: (batch: readonly NewTargetingValue[]) => Error | null
}

/**
 * In-memory CustomTargetingService. Names are unique per key, as on the
 * real service; creating an existing name is rejected. Filters are rendered
 * to PQL like the SOAP gateway does, so unquotable names fail here too.
 */
export class FakeCustomTargeting implements CustomTargetingGateway {
	readonly keys: TargetingKey[] = []
	readonly values: TargetingValue[] = []
	readonly calls: {
		getKeys: number
		createKeys: number
		readonly getValues: PageWindow[]
		readonly createValues: string[][]
		readonly performValueAction: ValueFilter[]
	} = { getKeys: 0, createKeys: 0, getValues: [], createValues: [], performValueAction: [] }
	private nextId = 1000

	constructor(private readonly options: FakeTargetingOptions = {}) {}

	addKey(name: string, values: readonly string[] = []): TargetingKey {
		const key: TargetingKey = { id: this.nextId++, name, type: 'FREEFORM', status: 'ACTIVE' }
		this.keys.push(key)
		for (const value of values) this.insertValue(key.id, value)
		return key
	}

	/** Names of every value of a key, in creation order. */
	valueNames(keyId: number): string[] {
		return this.values
			.filter((value) => value.customTargetingKeyId === keyId)
			.map((value) => value.name)
	}

	activeValueNames(keyId: number): string[] {
		return this.values
			.filter((value) => value.customTargetingKeyId === keyId && value.status === 'ACTIVE')
			.map((value) => value.name)
	}

	get mutationCount(): number {
		return (
			this.calls.createKeys +
			this.calls.createValues.length +
			this.calls.performValueAction.length
		)
	}

	async getKeys(filter: KeyFilter, window: PageWindow): Promise<Page<TargetingKey>> {
		this.calls.getKeys += 1
		keyFilterToWhere(filter)
		const matched = this.keys.filter(
			(key) => filter.name === undefined || key.name === filter.name,
		)
		return this.page(matched, window)
	}

	async createKeys(
		keys: readonly { readonly name: string; readonly type: TargetingKeyType }[],
	): Promise<TargetingKey[]> {
		this.calls.createKeys += 1
		return keys.map((entry) => {
			const key: TargetingKey = {
				id: this.nextId++,
				name: entry.name,
				type: entry.type,
				status: 'ACTIVE',
			}
			this.keys.push(key)
			return key
		})
	}

	async getValues(filter: ValueFilter, window: PageWindow): Promise<Page<TargetingValue>> {
		this.calls.getValues.push(window)
		valueFilterToWhere(filter)
		return this.page(this.matchValues(filter), window)
	}

	async createValues(values: readonly NewTargetingValue[]): Promise<TargetingValue[]> {
		this.calls.createValues.push(values.map((value) => value.name))
		const rejection = this.options.rejectCreate?.(values) ?? null
		if (rejection) throw rejection
		const duplicate = values.find((value) =>
			this.values.some(
				(existing) =>
					existing.customTargetingKeyId === value.customTargetingKeyId &&
					existing.name === value.name,
			),
		)
		if (duplicate) {
			throw new AdManagerApiError(`Duplicate value ${duplicate.name}`, {
				code: 'E_API_ERROR',
				recoverable: false,
				apiErrors: [{ reason: 'DUPLICATE_OBJECT' }],
			})
		}
		return values.map((value) => this.insertValue(value.customTargetingKeyId, value.name))
	}

	async performValueAction(
		_action: TargetingValueAction,
		filter: ValueFilter,
	): Promise<number> {
		this.calls.performValueAction.push(filter)
		valueFilterToWhere(filter)
		const matched = new Set(this.matchValues(filter).map((value) => value.id))
		let changed = 0
		for (const [index, value] of this.values.entries()) {
			if (!matched.has(value.id)) continue
			this.values[index] = { ...value, status: 'INACTIVE' }
			changed += 1
		}
		return changed
	}

	private insertValue(keyId: number, name: string): TargetingValue {
		const value: TargetingValue = {
			id: this.nextId++,
			customTargetingKeyId: keyId,
			name,
			matchType: 'EXACT',
			status: 'ACTIVE',
		}
		this.values.push(value)
		return value
	}

	private matchValues(filter: ValueFilter): TargetingValue[] {
		return this.values.filter(
			(value) =>
				value.customTargetingKeyId === filter.keyId &&
				(filter.names === undefined || filter.names.includes(value.name)) &&
				(filter.ids === undefined || filter.ids.includes(value.id)),
		)
	}

	private page<T>(matched: readonly T[], window: PageWindow): Page<T> {
		const size = Math.min(window.limit, this.options.serverPageSize ?? window.limit)
		return {
			totalResultSetSize: matched.length,
			startIndex: window.offset,
			results: matched.slice(window.offset, window.offset + size),
		}
	}
}

interface FakeReportsOptions {
	readonly savedQueries?: readonly SavedQuery[]
	/** Statuses returned by successive status polls; the last one repeats. */
	readonly statuses?: readonly ReportJobStatus[]
	readonly downloadUrl?: string
}

/** In-memory ReportService. */
export class FakeReports implements ReportGateway {
	readonly submitted: ReportQuery[] = []
	readonly downloads: { reportJobId: number; format: ExportFormat }[] = []
	statusPolls = 0

	constructor(private readonly options: FakeReportsOptions = {}) {}

	async getSavedQuery(id: number): Promise<SavedQuery | null> {
		return this.options.savedQueries?.find((query) => query.id === id) ?? null
	}

	async runReportJob(query: ReportQuery): Promise<number> {
		this.submitted.push(query)
		return 7000 + this.submitted.length
	}

	async getReportJobStatus(_reportJobId: number): Promise<ReportJobStatus> {
		const statuses = this.options.statuses ?? ['COMPLETED']
		const status = statuses[Math.min(this.statusPolls, statuses.length - 1)] ?? 'COMPLETED'
		this.statusPolls += 1
		return status
	}

	async getReportDownloadUrl(reportJobId: number, format: ExportFormat): Promise<string> {
		this.downloads.push({ reportJobId, format })
		return this.options.downloadUrl ?? `https://reports.test/download/${reportJobId}`
	}
}

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
} from './types'

/** Filter over custom targeting keys. */
export interface KeyFilter {
	readonly name?: string
}

/**
 * Filter over custom targeting values. Conditions are ANDed; an empty
 * `names` or `ids` list matches nothing.
 */
export interface ValueFilter {
	readonly keyId: number
	readonly names?: readonly string[]
	readonly ids?: readonly number[]
}

export type TargetingValueAction = 'DELETE'

/** The CustomTargetingService operations the toolkit depends on. */
export interface CustomTargetingGateway {
	getKeys(filter: KeyFilter, window: PageWindow): Promise<Page<TargetingKey>>
	createKeys(
		keys: readonly { readonly name: string; readonly type: TargetingKeyType }[],
	): Promise<TargetingKey[]>
	getValues(
		filter: ValueFilter,
		window: PageWindow,
	): Promise<Page<TargetingValue>>
	createValues(values: readonly NewTargetingValue[]): Promise<TargetingValue[]>
	/** Apply an action to every value matching the filter; returns the count changed. */
	performValueAction(
		action: TargetingValueAction,
		filter: ValueFilter,
	): Promise<number>
}

/** The ReportService operations the toolkit depends on. */
export interface ReportGateway {
	getSavedQuery(id: number): Promise<SavedQuery | null>
	runReportJob(query: ReportQuery): Promise<number>
	getReportJobStatus(reportJobId: number): Promise<ReportJobStatus>
	getReportDownloadUrl(
		reportJobId: number,
		format: ExportFormat,
	): Promise<string>
}

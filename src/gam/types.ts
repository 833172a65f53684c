/**
 * Canonical Ad Manager entity shapes used across the toolkit.
 *
 * These mirror the fields of the CustomTargetingService and ReportService
 * objects that the toolkit reads. Optional fields are ones the API may
 * leave out; ids are always present on records returned by the API.
 */

export type TargetingKeyType = 'FREEFORM' | 'PREDEFINED'

/** A custom targeting key (the "key" of a key-value pair). */
export interface TargetingKey {
	readonly id: number
	readonly name: string
	readonly displayName?: string
	readonly type: TargetingKeyType
	readonly status?: string
}

/** A custom targeting value; belongs to exactly one key. */
export interface TargetingValue {
	readonly id: number
	readonly customTargetingKeyId: number
	readonly name: string
	readonly displayName?: string
	readonly matchType?: string
	readonly status?: string
}

/** Fields accepted when creating a value. */
export interface NewTargetingValue {
	readonly customTargetingKeyId: number
	readonly name: string
}

/** One page of a statement-filtered query. */
export interface Page<T> {
	readonly totalResultSetSize: number
	readonly startIndex: number
	readonly results: readonly T[]
}

/** Offset/limit window of a paginated query. */
export interface PageWindow {
	readonly offset: number
	readonly limit: number
}

/** Rows x named columns; every row has one cell per column. */
export interface Table {
	readonly columns: readonly string[]
	readonly rows: readonly (readonly string[])[]
}

/**
 * Caller-supplied candidate values, normalized to strings before any
 * reconciliation runs.
 */
export type CandidateValues =
	| {
			readonly kind: 'list'
			readonly values: readonly (string | number | boolean)[]
	  }
	| {
			readonly kind: 'table'
			readonly table: Table
			readonly column?: string
	  }

/** A bind variable of a report filter statement. */
export interface StatementValue {
	readonly key: string
	readonly value: string | number | boolean
}

/** Filter applied to a report query (`WHERE` clause plus bind variables). */
export interface ReportFilter {
	readonly query: string
	readonly values: readonly StatementValue[]
}

/**
 * A ReportService ReportQuery (dimensions, columns, date range, ...).
 * The toolkit never interprets its fields; it only overrides them and
 * attaches a filter statement, so it is carried as an open record.
 */
export type ReportQuery = Readonly<Record<string, unknown>>

/** A saved query from the Ad Manager UI. */
export interface SavedQuery {
	readonly id: number
	readonly name?: string
	readonly isCompatibleWithApiVersion: boolean
	readonly reportQuery?: ReportQuery
}

export type ReportJobStatus = 'IN_PROGRESS' | 'COMPLETED' | 'FAILED'

export type ExportFormat = 'CSV_DUMP' | 'TSV' | 'CSV_EXCEL' | 'XML' | 'XLSX'

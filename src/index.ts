export {
	DEFAULT_API_BASE_URL,
	DEFAULT_API_VERSION,
	DEFAULT_APPLICATION_NAME,
	type EnvConfig,
	loadEnvConfig,
	loadServiceAccountKey,
	type ServiceAccountKey,
} from './gam/config'
export { columnIndex, formatCsv, parseCsv, parseCsvLine, stripColumnType } from './gam/csv'
export {
	AdManagerApiError,
	type ApiErrorDetail,
	AuthenticationError,
	ConfigError,
	StructuredError,
	SubmissionError,
} from './gam/errors'
export type {
	CustomTargetingGateway,
	KeyFilter,
	ReportGateway,
	TargetingValueAction,
	ValueFilter,
} from './gam/gateway'
export {
	type FileImportOptions,
	importValuesFromFile,
	importValuesFromTable,
	importValuesFromText,
	type TableImportOptions,
} from './gam/importers'
export { PqlInjectionError, quotePqlString, unsafePqlReason } from './gam/pql'
export {
	buildReportQuery,
	getSavedQuery,
	type ReportFailureReason,
	type ReportResult,
	type ReportSource,
	type RunReportOptions,
	runReport,
} from './gam/reports'
export { AD_MANAGER_SCOPE, type ConnectOptions, connect, type Session } from './gam/session'
export { createCustomTargetingGateway, createReportGateway } from './gam/soap'
export {
	chunk,
	createKey,
	DEFAULT_BATCH_SIZE,
	type DeactivateOptions,
	type DeactivationResult,
	deactivateValues,
	type DuplicatePolicy,
	fetchAllValues,
	findKeyByName,
	getCurrentValues,
	type KeyNotFound,
	normalizeCandidates,
	PAGE_SIZE,
	type PlanResult,
	planNewValues,
	planUpload,
	type ReconciliationPlan,
	type SyncProgress,
	type UploadOptions,
	type UploadResult,
	uploadNewValues,
} from './gam/targeting'
export type {
	CandidateValues,
	ExportFormat,
	Page,
	PageWindow,
	ReportFilter,
	ReportJobStatus,
	ReportQuery,
	SavedQuery,
	StatementValue,
	Table,
	TargetingKey,
	TargetingKeyType,
	TargetingValue,
} from './gam/types'
export { setupLogging, shutdownLogging } from './logging'

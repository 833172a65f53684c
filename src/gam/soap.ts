import { BearerSecurity, type Client, createClientAsync } from 'soap'
import { z } from 'zod'
import { type EventsConfig, emitEvent } from '../events'
import { getAdManagerLogger, getLogContext } from '../logging'
import {
	AdManagerApiError,
	type ApiErrorDetail,
	AuthenticationError,
} from './errors'
import type {
	CustomTargetingGateway,
	KeyFilter,
	ReportGateway,
	TargetingValueAction,
	ValueFilter,
} from './gateway'
import {
	buildStatement,
	formatPqlId,
	keyFilterToWhere,
	type Statement,
	valueFilterToWhere,
} from './pql'
import type { Session } from './session'
import type {
	ExportFormat,
	Page,
	PageWindow,
	ReportJobStatus,
	ReportQuery,
	SavedQuery,
	StatementValue,
	TargetingKey,
	TargetingValue,
} from './types'

type ServiceName = 'CustomTargetingService' | 'ReportService'

const apiLogger = getAdManagerLogger(['api'])

const VALUE_ACTION_TYPES: Record<TargetingValueAction, string> = {
	DELETE: 'DeleteCustomTargetingValues',
}

// -- Response schemas ------------------------------------------------------
// node-soap collapses single-element sequences into a bare object and may
// leave xsd:long values as strings, so arrays and numbers are normalized.

function soapArray<T extends z.ZodTypeAny>(item: T) {
	return z.preprocess((value) => {
		if (value === undefined || value === null) return []
		return Array.isArray(value) ? value : [value]
	}, z.array(item))
}

const IdSchema = z.coerce.number().int()

const SoapBooleanSchema = z.preprocess(
	(value) => (typeof value === 'string' ? value === 'true' : value),
	z.boolean(),
)

export const TargetingKeySchema = z.object({
	id: IdSchema,
	name: z.string(),
	displayName: z.string().optional(),
	type: z.enum(['FREEFORM', 'PREDEFINED']),
	status: z.string().optional(),
})

export const TargetingValueSchema = z.object({
	id: IdSchema,
	customTargetingKeyId: IdSchema,
	name: z.string(),
	displayName: z.string().optional(),
	matchType: z.string().optional(),
	status: z.string().optional(),
})

const SavedQuerySchema = z.object({
	id: IdSchema,
	name: z.string().optional(),
	isCompatibleWithApiVersion: SoapBooleanSchema,
	reportQuery: z.record(z.unknown()).optional(),
})

function pageSchema<T extends z.ZodTypeAny>(item: T) {
	return z.object({
		rval: z
			.object({
				totalResultSetSize: z.coerce.number().int().nonnegative().default(0),
				startIndex: z.coerce.number().int().nonnegative().default(0),
				results: soapArray(item),
			})
			.default({}),
	})
}

const KeyPageSchema = pageSchema(TargetingKeySchema)
const ValuePageSchema = pageSchema(TargetingValueSchema)
const SavedQueryPageSchema = pageSchema(SavedQuerySchema)
const KeyListSchema = z.object({ rval: soapArray(TargetingKeySchema) })
const ValueListSchema = z.object({ rval: soapArray(TargetingValueSchema) })
const UpdateResultSchema = z.object({
	rval: z
		.object({ numChanges: z.coerce.number().int().nonnegative().default(0) })
		.default({}),
})
const ReportJobSchema = z.object({ rval: z.object({ id: IdSchema }) })
const ReportJobStatusSchema = z.object({
	rval: z.enum(['IN_PROGRESS', 'COMPLETED', 'FAILED']),
})
const UrlSchema = z.object({ rval: z.string().url() })

const ReportFilterSchema = z.object({
	query: z.string(),
	values: z.array(
		z.object({
			key: z.string(),
			value: z.union([z.string(), z.number(), z.boolean()]),
		}),
	),
})

const ApiErrorSchema = z.object({
	fieldPath: z.string().optional(),
	trigger: z.string().optional(),
	errorString: z.string().optional(),
	reason: z.string().optional(),
})

const SoapFailureSchema = z
	.object({
		message: z.string().optional(),
		response: z
			.object({ status: z.coerce.number().int().optional() })
			.passthrough()
			.optional(),
		root: z
			.object({
				Envelope: z.object({
					Body: z.object({
						Fault: z
							.object({
								faultstring: z.string().optional(),
								detail: z
									.object({
										ApiExceptionFault: z
											.object({
												message: z.string().optional(),
												errors: soapArray(ApiErrorSchema),
											})
											.optional(),
									})
									.passthrough()
									.optional(),
							})
							.passthrough(),
					}),
				}),
			})
			.optional(),
	})
	.passthrough()

/** Convert a rejected SOAP call into a structured error. */
export function mapSoapError(err: unknown, operation: string): Error {
	if (err instanceof AdManagerApiError || err instanceof AuthenticationError) {
		return err
	}
	const parsed = SoapFailureSchema.safeParse(err)
	const failure = parsed.success ? parsed.data : null
	const status = failure?.response?.status
	const fault = failure?.root?.Envelope.Body.Fault
	const apiErrors: ApiErrorDetail[] = (
		fault?.detail?.ApiExceptionFault?.errors ?? []
	).map((entry) => ({
		reason: entry.reason ?? entry.errorString ?? 'UNKNOWN',
		fieldPath: entry.fieldPath,
		trigger: entry.trigger,
		errorString: entry.errorString,
	}))
	const detail =
		fault?.faultstring ??
		failure?.message ??
		(err instanceof Error ? err.message : String(err))
	const message = `Ad Manager ${operation} failed: ${detail}`
	const context = { operation, status }

	const authFault = apiErrors.some((entry) =>
		entry.errorString?.startsWith('AuthenticationError'),
	)
	if (status === 401 || status === 403 || authFault) {
		return new AuthenticationError(message, {
			code: 'E_UNAUTHORIZED',
			context,
			cause: err,
		})
	}
	if (fault) {
		return new AdManagerApiError(message, {
			code: 'E_API_ERROR',
			recoverable: false,
			status,
			apiErrors,
			context,
			cause: err,
		})
	}
	if (status !== undefined) {
		return new AdManagerApiError(message, {
			code: status >= 500 ? 'E_SERVER_ERROR' : 'E_API_ERROR',
			recoverable: status >= 500,
			status,
			context,
			cause: err,
		})
	}
	return new AdManagerApiError(message, {
		code: 'E_NETWORK',
		recoverable: true,
		context,
		cause: err,
	})
}

function parseResponse<T extends z.ZodTypeAny>(
	schema: T,
	raw: unknown,
	operation: string,
): z.infer<T> {
	const parsed = schema.safeParse(raw)
	if (!parsed.success) {
		throw new AdManagerApiError(
			`Unexpected ${operation} response: ${parsed.error.issues
				.map((issue) => `${issue.path.join('.')} ${issue.message}`)
				.join('; ')}`,
			{ code: 'E_INVALID_RESPONSE', recoverable: false, context: { operation } },
		)
	}
	return parsed.data
}

/** Parse a getCustomTargetingKeysByStatement result. */
export function parseKeyPage(raw: unknown): Page<TargetingKey> {
	return parseResponse(KeyPageSchema, raw, 'getCustomTargetingKeysByStatement').rval
}

/** Parse a getCustomTargetingValuesByStatement result. */
export function parseValuePage(raw: unknown): Page<TargetingValue> {
	return parseResponse(ValuePageSchema, raw, 'getCustomTargetingValuesByStatement')
		.rval
}

/** SOAP encoding of statement bind variables (typed `Value` subclasses). */
export function toSoapStatement(filter: {
	readonly query: string
	readonly values: readonly StatementValue[]
}): Record<string, unknown> {
	return {
		query: filter.query,
		values: filter.values.map((entry) => {
			const xsiType =
				typeof entry.value === 'number'
					? 'NumberValue'
					: typeof entry.value === 'boolean'
						? 'BooleanValue'
						: 'TextValue'
			return {
				key: entry.key,
				value: {
					attributes: { 'xsi:type': xsiType },
					value: String(entry.value),
				},
			}
		}),
	}
}

interface SoapGatewayOptions {
	readonly eventsConfig?: EventsConfig
}

/**
 * Lazily creates one node-soap client per service and invokes operations
 * with the session's RequestHeader and a fresh bearer token.
 */
class SoapTransport {
	private readonly clients = new Map<ServiceName, Promise<Client>>()

	constructor(
		private readonly session: Session,
		private readonly options: SoapGatewayOptions,
	) {}

	private get namespace(): string {
		return `https://www.google.com/apis/ads/publisher/${this.session.apiVersion}`
	}

	private async client(service: ServiceName): Promise<Client> {
		let pending = this.clients.get(service)
		if (!pending) {
			const wsdl = `${this.session.apiBaseUrl}/${this.session.apiVersion}/${service}?wsdl`
			pending = createClientAsync(wsdl).then((client) => {
				client.addSoapHeader({
					RequestHeader: {
						attributes: { xmlns: this.namespace },
						networkCode: String(this.session.networkCode),
						applicationName: this.session.applicationName,
					},
				})
				return client
			})
			// A failed WSDL load must not poison later calls.
			void pending.catch(() => {
				this.clients.delete(service)
			})
			this.clients.set(service, pending)
		}
		return await pending
	}

	async call(
		service: ServiceName,
		operation: string,
		args: Record<string, unknown>,
	): Promise<unknown> {
		const eventsConfig = this.options.eventsConfig ?? { url: null }
		const startedAt = Date.now()
		apiLogger.debug('Request {service}.{operation}', {
			service,
			operation,
			...getLogContext(),
		})
		emitEvent(eventsConfig, 'admanager-call-started', { service, operation })
		try {
			const client = await this.client(service)
			client.setSecurity(new BearerSecurity(await this.session.getAccessToken()))
			const method: unknown = client[`${operation}Async`]
			if (typeof method !== 'function') {
				throw new AdManagerApiError(`${service} has no operation ${operation}`, {
					code: 'E_API_ERROR',
					recoverable: false,
					context: { service, operation },
				})
			}
			const result: unknown = await method.call(client, args, {
				timeout: this.session.timeoutMs,
			})
			emitEvent(eventsConfig, 'admanager-call-completed', {
				service,
				operation,
				durationMs: Date.now() - startedAt,
			})
			return Array.isArray(result) ? result[0] : result
		} catch (err) {
			const mapped = mapSoapError(err, operation)
			apiLogger.warn('{service}.{operation} failed: {error}', {
				service,
				operation,
				error: mapped.message,
				...getLogContext(),
			})
			emitEvent(eventsConfig, 'admanager-call-error', {
				service,
				operation,
				message: mapped.message,
			})
			throw mapped
		}
	}
}

function filterStatement(where: string | null, window?: PageWindow): Statement {
	return buildStatement(where, window)
}

/** CustomTargetingService over SOAP. */
export function createCustomTargetingGateway(
	session: Session,
	options: SoapGatewayOptions = {},
): CustomTargetingGateway {
	const transport = new SoapTransport(session, options)
	const service = 'CustomTargetingService'

	return {
		async getKeys(filter: KeyFilter, window: PageWindow) {
			const raw = await transport.call(service, 'getCustomTargetingKeysByStatement', {
				filterStatement: filterStatement(keyFilterToWhere(filter), window),
			})
			return parseKeyPage(raw)
		},
		async createKeys(keys) {
			const raw = await transport.call(service, 'createCustomTargetingKeys', {
				keys: keys.map((key) => ({ name: key.name, type: key.type })),
			})
			return parseResponse(KeyListSchema, raw, 'createCustomTargetingKeys').rval
		},
		async getValues(filter: ValueFilter, window: PageWindow) {
			const raw = await transport.call(
				service,
				'getCustomTargetingValuesByStatement',
				{ filterStatement: filterStatement(valueFilterToWhere(filter), window) },
			)
			return parseValuePage(raw)
		},
		async createValues(values) {
			const raw = await transport.call(service, 'createCustomTargetingValues', {
				values: values.map((value) => ({
					customTargetingKeyId: value.customTargetingKeyId,
					name: value.name,
				})),
			})
			return parseResponse(ValueListSchema, raw, 'createCustomTargetingValues').rval
		},
		async performValueAction(action: TargetingValueAction, filter: ValueFilter) {
			const actionType = VALUE_ACTION_TYPES[action]
			const raw = await transport.call(
				service,
				'performCustomTargetingValueAction',
				{
					customTargetingValueAction: {
						attributes: { 'xsi:type': actionType },
					},
					filterStatement: filterStatement(valueFilterToWhere(filter)),
				},
			)
			return parseResponse(
				UpdateResultSchema,
				raw,
				'performCustomTargetingValueAction',
			).rval.numChanges
		},
	}
}

function toSoapReportQuery(query: ReportQuery): Record<string, unknown> {
	const statement = ReportFilterSchema.safeParse(query.statement)
	if (!statement.success) return { ...query }
	return { ...query, statement: toSoapStatement(statement.data) }
}

/** ReportService over SOAP. */
export function createReportGateway(
	session: Session,
	options: SoapGatewayOptions = {},
): ReportGateway {
	const transport = new SoapTransport(session, options)
	const service = 'ReportService'

	return {
		async getSavedQuery(id: number): Promise<SavedQuery | null> {
			const raw = await transport.call(service, 'getSavedQueriesByStatement', {
				filterStatement: buildStatement(`id = ${formatPqlId(id)}`, {
					offset: 0,
					limit: 1,
				}),
			})
			const page = parseResponse(
				SavedQueryPageSchema,
				raw,
				'getSavedQueriesByStatement',
			).rval
			return page.results[0] ?? null
		},
		async runReportJob(query: ReportQuery): Promise<number> {
			const raw = await transport.call(service, 'runReportJob', {
				reportJob: { reportQuery: toSoapReportQuery(query) },
			})
			return parseResponse(ReportJobSchema, raw, 'runReportJob').rval.id
		},
		async getReportJobStatus(reportJobId: number): Promise<ReportJobStatus> {
			const raw = await transport.call(service, 'getReportJobStatus', {
				reportJobId,
			})
			return parseResponse(ReportJobStatusSchema, raw, 'getReportJobStatus').rval
		},
		async getReportDownloadUrl(
			reportJobId: number,
			format: ExportFormat,
		): Promise<string> {
			const raw = await transport.call(service, 'getReportDownloadURL', {
				reportJobId,
				exportFormat: format,
			})
			return parseResponse(UrlSchema, raw, 'getReportDownloadURL').rval
		},
	}
}

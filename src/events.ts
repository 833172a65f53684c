import { getAdManagerLogger, getLogContext } from './logging'

interface EventEnvelope {
	readonly name: string
	readonly timestamp: string
	readonly payload: Record<string, unknown>
}

export interface EventsConfig {
	readonly url: string | null
}

const eventsLogger = getAdManagerLogger(['events'])

export function resolveEventsConfig(flags?: {
	readonly eventsUrl?: string | null
}): EventsConfig {
	if (process.env.ADMANAGER_EVENTS === '0') return { url: null }
	if (flags?.eventsUrl) return { url: flags.eventsUrl }
	if (process.env.ADMANAGER_EVENTS_URL) {
		return { url: process.env.ADMANAGER_EVENTS_URL }
	}
	return { url: null }
}

/** Emit an event to the observability server (fire-and-forget). */
export function emitEvent(
	config: EventsConfig,
	name: string,
	payload: Record<string, unknown>,
): void {
	if (!config.url) return

	const context = getLogContext()
	const envelope: EventEnvelope = {
		name,
		timestamp: new Date().toISOString(),
		payload: context ? { ...payload, runId: context.runId } : payload,
	}

	const endpoint = new URL(`/events/${name}`, config.url)
	void fetch(endpoint, {
		method: 'POST',
		headers: { 'Content-Type': 'application/json' },
		body: JSON.stringify(envelope),
	}).catch((err: unknown) => {
		eventsLogger.debug('Dropped event {name}: {error}', {
			name,
			error: err instanceof Error ? err.message : String(err),
		})
	})
}

import { chmodSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
	loadEnvConfig,
	loadServiceAccountKey,
	parseNetworkCode,
	resetEnvConfigCache,
} from '../../src/gam/config'
import { ConfigError } from '../../src/gam/errors'

const ENV_KEYS = [
	'ADMANAGER_NETWORK_CODE',
	'ADMANAGER_CREDENTIALS',
	'ADMANAGER_APPLICATION_NAME',
	'ADMANAGER_API_VERSION',
	'ADMANAGER_API_BASE_URL',
	'ADMANAGER_TIMEOUT_MS',
]

describe('loadEnvConfig', () => {
	beforeEach(() => {
		resetEnvConfigCache()
		for (const key of ENV_KEYS) vi.stubEnv(key, '')
	})

	afterEach(() => {
		vi.unstubAllEnvs()
		resetEnvConfigCache()
	})

	it('falls back to defaults', () => {
		expect(loadEnvConfig()).toEqual({
			networkCode: null,
			credentialsPath: null,
			applicationName: 'admanager-toolkit',
			apiVersion: 'v202508',
			apiBaseUrl: 'https://ads.google.com/apis/ads/publisher',
			timeoutMs: 120_000,
		})
	})

	it('reads the environment', () => {
		vi.stubEnv('ADMANAGER_NETWORK_CODE', '1234')
		vi.stubEnv('ADMANAGER_CREDENTIALS', '/secrets/key.json')
		vi.stubEnv('ADMANAGER_TIMEOUT_MS', '3000')

		expect(loadEnvConfig()).toMatchObject({
			networkCode: 1234,
			credentialsPath: '/secrets/key.json',
			timeoutMs: 3000,
		})
	})

	it('names the invalid variable', () => {
		vi.stubEnv('ADMANAGER_API_VERSION', '2024')

		expect(() => loadEnvConfig()).toThrow(
			'Invalid env config: ADMANAGER_API_VERSION: API version must look like v202508',
		)
	})

	it('caches the first result', () => {
		vi.stubEnv('ADMANAGER_NETWORK_CODE', '1')
		const first = loadEnvConfig()
		vi.stubEnv('ADMANAGER_NETWORK_CODE', '2')

		expect(loadEnvConfig()).toBe(first)
	})
})

describe('parseNetworkCode', () => {
	it('accepts digits', () => {
		expect(parseNetworkCode('21700')).toBe(21700)
	})

	it('rejects anything else as a usage error', () => {
		expect(() => parseNetworkCode('abc')).toThrow(ConfigError)
		expect(() => parseNetworkCode('-5')).toThrow('network code must be positive')
	})
})

describe('loadServiceAccountKey', () => {
	let dir: string

	function writeKey(name: string, content: string, mode = 0o600): string {
		const file = path.join(dir, name)
		writeFileSync(file, content)
		chmodSync(file, mode)
		return file
	}

	beforeEach(() => {
		dir = mkdtempSync(path.join(tmpdir(), 'config-test-'))
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	const key = {
		type: 'service_account',
		private_key: 'test-private-key',
		client_email: 'robot@example.iam.gserviceaccount.com',
		token_uri: 'https://oauth2.googleapis.com/token',
		project_id: 'test-project',
	}

	it('reads an owner-only key file', async () => {
		const file = writeKey('key.json', JSON.stringify(key))

		await expect(loadServiceAccountKey(file)).resolves.toEqual(key)
	})

	it('refuses a group-readable key file', async () => {
		const file = writeKey('key.json', JSON.stringify(key), 0o644)

		await expect(loadServiceAccountKey(file)).rejects.toMatchObject({
			code: 'E_INSECURE_CREDENTIALS',
		})
	})

	it('refuses a symlink', async () => {
		const target = writeKey('key.json', JSON.stringify(key))
		const link = path.join(dir, 'link.json')
		symlinkSync(target, link)

		await expect(loadServiceAccountKey(link)).rejects.toMatchObject({
			code: 'E_INSECURE_CREDENTIALS',
		})
	})

	it('reports a missing file as a config error', async () => {
		const file = path.join(dir, 'absent.json')

		await expect(loadServiceAccountKey(file)).rejects.toMatchObject({
			code: 'E_CONFIG',
			message: `Credential file not found: ${file}`,
		})
	})

	it('reports invalid JSON', async () => {
		const file = writeKey('key.json', '{not json')

		await expect(loadServiceAccountKey(file)).rejects.toMatchObject({
			code: 'E_CONFIG',
			message: 'Credential file is not valid JSON',
		})
	})

	it('names missing fields', async () => {
		const { client_email: _omitted, ...incomplete } = key
		const file = writeKey('key.json', JSON.stringify(incomplete))

		await expect(loadServiceAccountKey(file)).rejects.toThrow(
			'Invalid credential file: client_email: Required',
		)
	})
})

import { describe, expect, it } from 'vitest'
import {
	buildStatement,
	formatPqlId,
	keyFilterToWhere,
	PqlInjectionError,
	quotePqlString,
	unsafePqlReason,
	valueFilterToWhere,
} from '../../src/gam/pql'

describe('unsafePqlReason', () => {
	it('accepts names that quote cleanly', () => {
		expect(unsafePqlReason('sports news')).toBeNull()
	})

	it('names the offending character', () => {
		expect(unsafePqlReason("O'Brien")).toBe('contains a quote character')
	})
})

describe('quotePqlString', () => {
	it('wraps plain values in single quotes', () => {
		expect(quotePqlString('sports news')).toBe("'sports news'")
	})

	it.each([
		["o'brien", 'Invalid PQL value: contains a quote character'],
		['say "hi"', 'Invalid PQL value: contains a quote character'],
		['a\\b', 'Invalid PQL value: contains a backslash'],
		['a\nb', 'Invalid PQL value: contains a line break'],
	])('rejects %j', (value, message) => {
		expect(() => quotePqlString(value)).toThrow(message)
	})

	it('records the offending value', () => {
		try {
			quotePqlString("x' OR '1'='1")
			expect.unreachable()
		} catch (err) {
			expect(err).toBeInstanceOf(PqlInjectionError)
			expect(err).toMatchObject({
				code: 'E_USAGE',
				context: { unsafeValue: "x' OR '1'='1" },
			})
		}
	})
})

describe('formatPqlId', () => {
	it('renders safe integers', () => {
		expect(formatPqlId(12345)).toBe('12345')
	})

	it('rejects fractions and negatives', () => {
		expect(() => formatPqlId(1.5)).toThrow(PqlInjectionError)
		expect(() => formatPqlId(-1)).toThrow(PqlInjectionError)
	})
})

describe('filters', () => {
	it('matches every key without a name', () => {
		expect(keyFilterToWhere({})).toBeNull()
	})

	it('filters keys by exact name', () => {
		expect(keyFilterToWhere({ name: 'geo' })).toBe("name = 'geo'")
	})

	it('ANDs value conditions', () => {
		expect(valueFilterToWhere({ keyId: 42, names: ['US', 'CA'], ids: [7] })).toBe(
			"customTargetingKeyId = 42 AND name IN ('US', 'CA') AND id IN (7)",
		)
	})

	it('refuses empty lists', () => {
		expect(() => valueFilterToWhere({ keyId: 42, names: [] })).toThrow(
			'Empty name list in value filter',
		)
		expect(() => valueFilterToWhere({ keyId: 42, ids: [] })).toThrow(
			'Empty id list in value filter',
		)
	})
})

describe('buildStatement', () => {
	it('appends the page window', () => {
		expect(buildStatement('customTargetingKeyId = 1', { offset: 500, limit: 500 })).toEqual({
			query: 'WHERE customTargetingKeyId = 1 LIMIT 500 OFFSET 500',
		})
	})

	it('omits missing parts', () => {
		expect(buildStatement(null, { offset: 0, limit: 1 })).toEqual({ query: 'LIMIT 1 OFFSET 0' })
		expect(buildStatement('id = 3')).toEqual({ query: 'WHERE id = 3' })
	})
})

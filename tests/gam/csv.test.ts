import { describe, expect, it } from 'vitest'
import {
	columnIndex,
	formatCsv,
	parseCsv,
	parseCsvLine,
	stripColumnType,
} from '../../src/gam/csv'

describe('parseCsvLine', () => {
	it('splits and trims unquoted fields', () => {
		expect(parseCsvLine('a, b ,c')).toEqual(['a', 'b', 'c'])
	})

	it('keeps delimiters and doubled quotes inside quoted fields', () => {
		expect(parseCsvLine('"Smith, J","say ""hi""",x')).toEqual(['Smith, J', 'say "hi"', 'x'])
	})

	it('keeps trailing empty fields', () => {
		expect(parseCsvLine('a,,')).toEqual(['a', '', ''])
	})

	it('accepts another delimiter', () => {
		expect(parseCsvLine('a\tb', '\t')).toEqual(['a', 'b'])
	})
})

describe('parseCsv', () => {
	it('reads a header and rows', () => {
		expect(parseCsv('Dimension.DATE,Column.AD_SERVER_IMPRESSIONS\r\n2024-01-01,10\r\n')).toEqual({
			columns: ['Dimension.DATE', 'Column.AD_SERVER_IMPRESSIONS'],
			rows: [['2024-01-01', '10']],
		})
	})

	it('pads short rows and truncates long ones', () => {
		expect(parseCsv('a,b\n1\n1,2,3\n')).toEqual({
			columns: ['a', 'b'],
			rows: [
				['1', ''],
				['1', '2'],
			],
		})
	})

	it('strips a byte order mark', () => {
		expect(parseCsv('\uFEFFa\n1')?.columns).toEqual(['a'])
	})

	it('returns null for empty input', () => {
		expect(parseCsv('')).toBeNull()
		expect(parseCsv('\n\n')).toBeNull()
	})
})

describe('stripColumnType', () => {
	it('drops the text up to the first dot', () => {
		expect(stripColumnType('Dimension.AD_UNIT_NAME')).toBe('AD_UNIT_NAME')
		expect(stripColumnType('DimensionAttribute.ORDER.NAME')).toBe('ORDER.NAME')
	})

	it('keeps names without a prefix', () => {
		expect(stripColumnType('DATE')).toBe('DATE')
	})
})

describe('columnIndex', () => {
	const table = { columns: ['a', 'b'], rows: [] }

	it('defaults to the first column', () => {
		expect(columnIndex(table)).toBe(0)
	})

	it('finds a named column', () => {
		expect(columnIndex(table, 'b')).toBe(1)
	})

	it('names the available columns for an unknown one', () => {
		expect(() => columnIndex(table, 'c')).toThrow('Unknown column "c" (available: a, b)')
	})
})

describe('formatCsv', () => {
	it('quotes fields that need it', () => {
		expect(
			formatCsv({ columns: ['name', 'note'], rows: [['a,b', 'say "hi"']] }),
		).toBe('name,note\n"a,b","say ""hi"""\n')
	})
})

import type { Cell, NormalizedRecord } from '../types'
import { answerColumns } from './normalize'

const LOG_PREFIX = '[Pipeline]'

export const DEFAULT_SIGNAL_COLUMNS = ['hours', 'Help', 'Understanding', 'Speed']

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

export interface SignalResult {
	records: NormalizedRecord[]
	/** Columns coerced to numbers, in column order */
	numericColumns: string[]
	/** Column -> count of values that could not be parsed */
	missing: Record<string, number>
}

export function matchesAny(column: string, substrings: string[]): boolean {
	return substrings.some((s) => column.includes(s))
}

/**
 * Decimal number or null. Empty strings, hex and anything with trailing text
 * are null, never 0.
 */
export function toNumber(value: Cell | undefined): number | null {
	if (value === null || value === undefined) return null
	if (typeof value === 'number') return Number.isFinite(value) ? value : null
	const text = value.trim()
	if (!DECIMAL.test(text)) return null
	const n = Number(text)
	return Number.isFinite(n) ? n : null
}

export function extractSignals(records: NormalizedRecord[], substrings: string[]): SignalResult {
	const numericColumns = answerColumns(records).filter((c) => matchesAny(c, substrings))
	const missing: Record<string, number> = {}
	const out = records.map((r) => {
		const answers = { ...r.answers }
		for (const column of numericColumns) {
			if (!(column in answers)) continue
			const value = answers[column]
			const n = toNumber(value)
			if (n === null && value !== null) {
				missing[column] = (missing[column] ?? 0) + 1
			}
			answers[column] = n
		}
		return { ...r, answers }
	})
	if (Object.keys(missing).length) {
		console.warn(LOG_PREFIX, 'Unparseable numeric answers treated as missing', { missing })
	}
	return { records: out, numericColumns, missing }
}

import type { NormalizedRecord, ReportRow } from '../types'
import { answerColumns } from './normalize'

/**
 * A column is numeric when it holds at least one number and nothing but
 * numbers and missing cells.
 */
export function isNumericColumn(records: NormalizedRecord[], column: string): boolean {
	let numbers = 0
	for (const r of records) {
		const value = r.answers[column]
		if (value === null || value === undefined) continue
		if (typeof value !== 'number') return false
		numbers++
	}
	return numbers > 0
}

/**
 * Mean of every numeric column over the validated records, in column order.
 * Signal columns are always reported, so one whose values all failed to parse
 * shows up with mean null. Missing cells are left out of the mean.
 */
export function aggregateReport(records: NormalizedRecord[], signalColumns: string[]): ReportRow[] {
	const signals = new Set(signalColumns)
	const columns = answerColumns(records).filter((c) => signals.has(c) || isNumericColumn(records, c))
	return columns.map((signal) => {
		let sum = 0
		let count = 0
		let missing = 0
		for (const r of records) {
			const value = r.answers[signal]
			if (typeof value === 'number' && Number.isFinite(value)) {
				sum += value
				count++
			} else {
				missing++
			}
		}
		return { signal, mean: count ? sum / count : null, count, missing }
	})
}

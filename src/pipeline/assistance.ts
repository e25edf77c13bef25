import type { NormalizedRecord } from '../types'
import { matchesAny } from './signals'

export const DEFAULT_RATING_COLUMNS = ['Help', 'Understanding', 'Speed']
export const DEFAULT_HELP_THRESHOLD = 2

export interface AssistanceOptions {
	/** Substrings naming the rating columns */
	columns: string[]
	/** Ratings strictly below this ask for help */
	threshold: number
}

export function needsAssistance(record: NormalizedRecord, opts: AssistanceOptions): boolean {
	return Object.entries(record.answers).some(([column, value]) => {
		if (!matchesAny(column, opts.columns)) return false
		// missing ratings never flag a student
		if (typeof value !== 'number') return false
		return value < opts.threshold
	})
}

export function detectAssistanceNeeds(records: NormalizedRecord[], opts: AssistanceOptions): NormalizedRecord[] {
	return records.filter((r) => needsAssistance(r, opts))
}

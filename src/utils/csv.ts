import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import Papa from 'papaparse'
import type { NormalizedRecord, ReportRow } from '../types'
import { METADATA_FIELDS } from '../types'
import { answerColumns } from '../pipeline/normalize'

type CsvCell = string | number

/**
 * Header line then one line per row, no trailing newline, also when there
 * are no rows.
 */
function table(fields: string[], rows: CsvCell[][]): string {
	return Papa.unparse([fields, ...rows], { newline: '\n' })
}

export function reportCsv(rows: ReportRow[]): string {
	return table(
		['signal', 'mean', 'count', 'missing'],
		rows.map((r) => [r.signal, r.mean ?? '', r.count, r.missing]),
	)
}

/**
 * Metadata columns, then every answer column in first-seen order, then
 * whether the student asked for help.
 */
export function recordsCsv(records: NormalizedRecord[], flagged: NormalizedRecord[]): string {
	const flaggedIds = new Set(flagged.map((r) => r.responseId))
	const columns = answerColumns(records)
	return table(
		[...METADATA_FIELDS, ...columns, 'needsAssistance'],
		records.map((r) => [
			...METADATA_FIELDS.map((f) => r[f]),
			...columns.map((c) => r.answers[c] ?? ''),
			flaggedIds.has(r.responseId) ? 'true' : 'false',
		]),
	)
}

export async function writeReportCsv(dir: string, date: string, rows: ReportRow[]): Promise<string> {
	const path = join(dir, `${date}_report.csv`)
	await mkdir(dir, { recursive: true })
	await writeFile(path, reportCsv(rows), 'utf8')
	return path
}

export async function writeRecordsCsv(
	dir: string,
	date: string,
	records: NormalizedRecord[],
	flagged: NormalizedRecord[],
): Promise<string> {
	const path = join(dir, `${date}_out.csv`)
	await mkdir(dir, { recursive: true })
	await writeFile(path, recordsCsv(records, flagged), 'utf8')
	return path
}

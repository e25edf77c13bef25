import { DateTime } from 'luxon'
import type { NormalizedRecord } from '../types'
import { ConfigError } from '../errors'

const LOG_PREFIX = '[Pipeline]'

export interface WindowOptions {
	/** Local calendar date, YYYY-MM-DD */
	date: string
	/** Local HH:mm */
	start: string
	end: string
	/** Zone the lecture times are given in */
	timeZone: string
	/** Zone the forms provider reports timestamps in */
	providerTimeZone: string
}

export interface LectureWindow {
	start: DateTime
	end: DateTime
}

export interface SkippedRecord {
	responseId: string
	lastSubmittedTime: string
}

export interface WindowResult {
	kept: NormalizedRecord[]
	/** Records whose timestamp was missing or unparseable */
	skipped: SkippedRecord[]
}

export function lectureWindow(opts: WindowOptions): LectureWindow {
	const start = DateTime.fromISO(`${opts.date}T${opts.start}`, { zone: opts.timeZone }).setZone(opts.providerTimeZone)
	const end = DateTime.fromISO(`${opts.date}T${opts.end}`, { zone: opts.timeZone }).setZone(opts.providerTimeZone)
	if (!start.isValid || !end.isValid) {
		throw new ConfigError([`invalid lecture window ${opts.date} ${opts.start}-${opts.end} (${opts.timeZone})`])
	}
	return { start, end }
}

/**
 * Timestamps without an offset are read in the provider zone.
 */
export function parseTimestamp(value: string, providerTimeZone = 'UTC'): DateTime | null {
	if (!value) return null
	const ts = DateTime.fromISO(value, { zone: providerTimeZone, setZone: true })
	return ts.isValid ? ts : null
}

export function inWindow(ts: DateTime, window: LectureWindow): boolean {
	const ms = ts.toMillis()
	return window.start.toMillis() <= ms && ms <= window.end.toMillis()
}

/**
 * Keeps records submitted within [start, end] (both ends included) of the
 * lecture on the given date. Input order is preserved.
 */
export function filterByWindow(records: NormalizedRecord[], opts: WindowOptions): WindowResult {
	const window = lectureWindow(opts)
	const kept: NormalizedRecord[] = []
	const skipped: SkippedRecord[] = []
	for (const r of records) {
		const ts = parseTimestamp(r.lastSubmittedTime, opts.providerTimeZone)
		if (!ts) {
			skipped.push({ responseId: r.responseId, lastSubmittedTime: r.lastSubmittedTime })
			continue
		}
		if (inWindow(ts, window)) kept.push(r)
	}
	if (skipped.length) {
		console.warn(LOG_PREFIX, 'Skipping submissions with unparseable timestamps', { skipped })
	}
	console.log(LOG_PREFIX, 'Time window filter', {
		start: window.start.toISO(),
		end: window.end.toISO(),
		total: records.length,
		kept: kept.length,
	})
	return { kept, skipped }
}

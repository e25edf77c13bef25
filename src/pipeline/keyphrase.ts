import * as fuzz from 'fuzzball'
import type { NormalizedRecord } from '../types'

const LOG_PREFIX = '[Pipeline]'

export const DEFAULT_KEYPHRASE_FIELD = 'What is the Concept of the Day?'
export const DEFAULT_FUZZ_THRESHOLD = 70

export interface KeyphraseOptions {
	/** Title of the free-text question holding the keyphrase */
	field: string
	keyphrase: string
	/** 0-100 */
	threshold: number
}

export interface KeyphraseResult {
	accepted: NormalizedRecord[]
	rejected: NormalizedRecord[]
}

export function normalizeAnswer(value: string | number | null | undefined): string {
	if (value === null || value === undefined) return ''
	return String(value).trim().toLowerCase()
}

/**
 * Partial token-set similarity (0-100): word order and extra words do not
 * count against a match, and partial substrings score.
 */
export function keyphraseScore(answer: string, keyphrase: string): number {
	const a = normalizeAnswer(answer)
	const b = normalizeAnswer(keyphrase)
	if (!a || !b) return 0
	return fuzz.partial_token_set_ratio(a, b)
}

/**
 * Keeps records whose keyphrase answer scores at or above the threshold. The
 * returned records carry the trimmed, lower-cased answer; inputs are not mutated.
 */
export function validateKeyphrase(records: NormalizedRecord[], opts: KeyphraseOptions): KeyphraseResult {
	const accepted: NormalizedRecord[] = []
	const rejected: NormalizedRecord[] = []
	for (const r of records) {
		const answer = normalizeAnswer(r.answers[opts.field])
		const copy: NormalizedRecord = { ...r, answers: { ...r.answers, [opts.field]: answer } }
		if (keyphraseScore(answer, opts.keyphrase) >= opts.threshold) accepted.push(copy)
		else rejected.push(copy)
	}
	console.log(LOG_PREFIX, 'Keyphrase validation', { threshold: opts.threshold, accepted: accepted.length, rejected: rejected.length })
	return { accepted, rejected }
}

import type { Cell, FieldValue, NormalizedRecord, QuestionSchema, RawSubmission, SubmissionMetadata } from '../types'
import { METADATA_FIELDS } from '../types'

const LOG_PREFIX = '[Pipeline]'

export interface NormalizeResult {
	records: NormalizedRecord[]
	/** Question ids referenced by submissions but missing from the current schema */
	deprecated: string[]
}

const METADATA_KEYS = new Set<string>(METADATA_FIELDS)

/**
 * First `_segment_` of a flattened key: answers_7a1b2c3d_textAnswers_answers_0_value -> 7a1b2c3d
 */
export function embeddedQuestionId(key: string): string | undefined {
	const m = key.match(/_([^_]*)_/)
	return m ? m[1] : undefined
}

export function toCell(value: FieldValue | undefined): Cell {
	if (value === undefined || value === null) return null
	if (typeof value === 'boolean') return String(value)
	return value
}

function metadataOf(raw: RawSubmission): SubmissionMetadata {
	const text = (key: keyof SubmissionMetadata) => {
		const v = raw[key]
		return v === undefined || v === null ? '' : String(v)
	}
	return {
		responseId: text('responseId'),
		createTime: text('createTime'),
		lastSubmittedTime: text('lastSubmittedTime'),
		respondentEmail: text('respondentEmail'),
	}
}

export function normalizeSubmission(raw: RawSubmission, schema: QuestionSchema, deprecated?: Set<string>): NormalizedRecord {
	const answers: Record<string, Cell> = {}
	for (const [key, value] of Object.entries(raw)) {
		if (METADATA_KEYS.has(key)) continue
		// questionId fields only repeat the id already embedded in the key
		if (key.endsWith('questionId')) continue
		const questionId = embeddedQuestionId(key)
		if (questionId === undefined) {
			if (value !== null) answers[key] = toCell(value)
			continue
		}
		const title = schema.get(questionId)
		if (title === undefined) {
			deprecated?.add(questionId)
			continue
		}
		// quiz grading (grade_score, grade_correct, grade_feedback_*) is not part of the answer
		if (key.slice(key.indexOf(`_${questionId}_`) + questionId.length + 2).startsWith('grade_')) continue
		const cell = toCell(value)
		const prev = answers[title]
		// several values under one question (checkbox answers) are joined in key order
		answers[title] = prev === undefined || prev === null ? cell : cell === null ? prev : `${prev}, ${cell}`
	}
	return { ...metadataOf(raw), answers }
}

/**
 * Rewrites question-id keyed fields to the current question titles and drops
 * fields of questions no longer on the form.
 */
export function normalizeSubmissions(raw: RawSubmission[], schema: QuestionSchema): NormalizeResult {
	const deprecated = new Set<string>()
	const records = raw.map((r) => normalizeSubmission(r, schema, deprecated))
	if (deprecated.size) {
		console.warn(LOG_PREFIX, 'Dropping answers to questions no longer on the form', { questionIds: Array.from(deprecated) })
	}
	return { records, deprecated: Array.from(deprecated) }
}

/**
 * Answer columns across records in first-seen order.
 */
export function answerColumns(records: NormalizedRecord[]): string[] {
	const columns = new Set<string>()
	for (const r of records) {
		for (const key of Object.keys(r.answers)) columns.add(key)
	}
	return Array.from(columns)
}

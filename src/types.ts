export type Score = 0 | 1

/**
 * Question id -> question title. Ids are only stable within one form version,
 * titles are the durable key.
 */
export type QuestionSchema = Map<string, string>

export type FieldValue = string | number | boolean | null

/**
 * One flattened form response. Question fields carry their id inside the key
 * (answers_<questionId>_textAnswers_answers_0_value).
 */
export type RawSubmission = Record<string, FieldValue>

/**
 * A cell after normalization. null means missing.
 */
export type Cell = string | number | null

export interface SubmissionMetadata {
	responseId: string
	createTime: string
	lastSubmittedTime: string
	respondentEmail: string
}

export const METADATA_FIELDS = ['responseId', 'createTime', 'lastSubmittedTime', 'respondentEmail'] as const

export interface NormalizedRecord extends SubmissionMetadata {
	/**
	 * Answers keyed by current question title, in first-seen order
	 */
	answers: Record<string, Cell>
}

export interface RosterEntry {
	id: number
	loginId: string
	displayName: string
}

export interface AssignmentHandle {
	id: number
	name: string
	pointsPossible?: number
}

export interface Decision {
	entry: RosterEntry
	score: Score
	evidence?: NormalizedRecord
}

export interface ReportRow {
	signal: string
	mean: number | null
	count: number
	missing: number
}

export interface FormsProvider {
	fetchSchema(): Promise<QuestionSchema>
	fetchSubmissions(): Promise<RawSubmission[]>
}

export interface GradebookProvider {
	listRoster(): Promise<RosterEntry[]>
	getAssignment(id: number): Promise<AssignmentHandle>
	submitDecision(assignment: AssignmentHandle, entry: RosterEntry, score: Score): Promise<void>
}

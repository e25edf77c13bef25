import type {
	AssignmentHandle,
	Cell,
	FormsProvider,
	GradebookProvider,
	NormalizedRecord,
	QuestionSchema,
	RawSubmission,
	RosterEntry,
	Score,
} from '../src/types'

export function record(
	respondentEmail: string,
	answers: Record<string, Cell> = {},
	lastSubmittedTime = '2024-10-03T20:30:00Z',
): NormalizedRecord {
	return {
		responseId: `resp-${respondentEmail}`,
		createTime: lastSubmittedTime,
		lastSubmittedTime,
		respondentEmail,
		answers,
	}
}

export function student(id: number, loginId: string, displayName = loginId): RosterEntry {
	return { id, loginId, displayName }
}

export class FakeForms implements FormsProvider {
	constructor(
		public schema: QuestionSchema,
		public submissions: RawSubmission[],
	) {}

	async fetchSchema(): Promise<QuestionSchema> {
		return this.schema
	}

	async fetchSubmissions(): Promise<RawSubmission[]> {
		return this.submissions
	}
}

export class FakeGradebook implements GradebookProvider {
	readonly posted: { userId: number; score: Score }[] = []
	listCalls = 0
	failFor = new Set<number>()

	constructor(public roster: RosterEntry[]) {}

	async listRoster(): Promise<RosterEntry[]> {
		this.listCalls++
		return this.roster
	}

	async getAssignment(id: number): Promise<AssignmentHandle> {
		return { id, name: `Lecture ${id}` }
	}

	async submitDecision(_assignment: AssignmentHandle, entry: RosterEntry, score: Score): Promise<void> {
		if (this.failFor.has(entry.id)) throw new Error(`gradebook rejected ${entry.id}`)
		this.posted.push({ userId: entry.id, score })
	}
}

export function jsonResponse(body: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
	return new Response(JSON.stringify(body), {
		status: init.status ?? 200,
		headers: { 'Content-Type': 'application/json', ...(init.headers || {}) },
	})
}

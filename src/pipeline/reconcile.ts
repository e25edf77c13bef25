import type { AssignmentHandle, Decision, GradebookProvider, NormalizedRecord, RosterEntry } from '../types'
import { errorMessage } from '../errors'

const LOG_PREFIX = '[Pipeline]'

export interface SubmissionFailure {
	entry: RosterEntry
	error: string
}

export interface SubmitResult {
	submitted: number
	failed: SubmissionFailure[]
}

export interface SubmitOptions {
	/** Log decisions instead of sending them */
	dryRun?: boolean
}

/**
 * One decision per roster entry, in roster order. Identity matching is an
 * exact, case-sensitive comparison of login id and respondent email.
 */
export function reconcileRoster(roster: RosterEntry[], records: NormalizedRecord[]): Decision[] {
	const byIdentity = new Map<string, NormalizedRecord>()
	for (const r of records) {
		if (r.respondentEmail && !byIdentity.has(r.respondentEmail)) byIdentity.set(r.respondentEmail, r)
	}
	return roster.map((entry): Decision => {
		const evidence = entry.loginId ? byIdentity.get(entry.loginId) : undefined
		return evidence ? { entry, score: 1, evidence } : { entry, score: 0 }
	})
}

/**
 * Sends every decision once, one at a time. A failed entry is logged and
 * counted; the remaining entries are still attempted.
 */
export async function submitDecisions(
	gradebook: GradebookProvider,
	assignment: AssignmentHandle,
	decisions: Decision[],
	options: SubmitOptions = {},
): Promise<SubmitResult> {
	let submitted = 0
	const failed: SubmissionFailure[] = []
	for (const decision of decisions) {
		if (options.dryRun) {
			console.log(LOG_PREFIX, 'Dry run, not submitting', { loginId: decision.entry.loginId, score: decision.score })
			continue
		}
		try {
			await gradebook.submitDecision(assignment, decision.entry, decision.score)
			submitted++
		} catch (err) {
			console.error(LOG_PREFIX, 'Grade submission failed', { userId: decision.entry.id, loginId: decision.entry.loginId, error: errorMessage(err) })
			failed.push({ entry: decision.entry, error: errorMessage(err) })
		}
	}
	return { submitted, failed }
}

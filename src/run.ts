import type { RunConfig } from './config'
import type { Decision, FormsProvider, GradebookProvider, NormalizedRecord, ReportRow } from './types'
import { normalizeSubmissions } from './pipeline/normalize'
import { filterByWindow } from './pipeline/window'
import type { SkippedRecord } from './pipeline/window'
import { validateKeyphrase } from './pipeline/keyphrase'
import { extractSignals } from './pipeline/signals'
import { detectAssistanceNeeds } from './pipeline/assistance'
import { aggregateReport } from './pipeline/report'
import { reconcileRoster, submitDecisions } from './pipeline/reconcile'
import type { SubmissionFailure } from './pipeline/reconcile'
import { ConfigError } from './errors'

const LOG_PREFIX = '[Run]'

export interface Providers {
	forms: FormsProvider
	gradebook: GradebookProvider
}

export interface RunSummary {
	date: string
	report: ReportRow[]
	/** Validated, signal-extracted records */
	records: NormalizedRecord[]
	/** Records asking for help */
	flagged: NormalizedRecord[]
	decisions: Decision[]
	submitted: number
	failed: SubmissionFailure[]
	warnings: {
		deprecatedQuestions: string[]
		skippedTimestamps: SkippedRecord[]
		rejectedKeyphrases: number
		unparseableNumbers: Record<string, number>
	}
}

/**
 * One attendance run for one lecture date. Provider failures propagate and end
 * the run; only grade submission isolates failures per student.
 */
export async function runAttendance(config: RunConfig, providers: Providers): Promise<RunSummary> {
	console.log(LOG_PREFIX, 'Starting attendance run', { date: config.date, assignmentId: config.assignmentId, dryRun: config.dryRun })

	const schema = await providers.forms.fetchSchema()
	// without the keyphrase question every student would be marked absent
	if (!Array.from(schema.values()).includes(config.keyphraseField)) {
		throw new ConfigError([`keyphrase question "${config.keyphraseField}" is not on the form`])
	}
	const raw = await providers.forms.fetchSubmissions()

	const normalized = normalizeSubmissions(raw, schema)
	const windowed = filterByWindow(normalized.records, { date: config.date, ...config.window })
	const validated = validateKeyphrase(windowed.kept, {
		field: config.keyphraseField,
		keyphrase: config.keyphrase,
		threshold: config.fuzzThreshold,
	})
	const signals = extractSignals(validated.accepted, config.signalColumns)

	const report = aggregateReport(signals.records, signals.numericColumns)
	const flagged = detectAssistanceNeeds(signals.records, { columns: config.ratingColumns, threshold: config.helpThreshold })

	const roster = await providers.gradebook.listRoster()
	const assignment = await providers.gradebook.getAssignment(config.assignmentId)
	const decisions = reconcileRoster(roster, signals.records)
	const present = decisions.filter((d) => d.score === 1).length
	console.log(LOG_PREFIX, 'Decisions computed', { roster: roster.length, present, absent: decisions.length - present })

	const { submitted, failed } = await submitDecisions(providers.gradebook, assignment, decisions, { dryRun: config.dryRun })
	if (failed.length) {
		console.warn(LOG_PREFIX, `${failed.length} grade submission(s) failed`)
	}

	return {
		date: config.date,
		report,
		records: signals.records,
		flagged,
		decisions,
		submitted,
		failed,
		warnings: {
			deprecatedQuestions: normalized.deprecated,
			skippedTimestamps: windowed.skipped,
			rejectedKeyphrases: validated.rejected.length,
			unparseableNumbers: signals.missing,
		},
	}
}

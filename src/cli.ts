import * as dotenv from 'dotenv'
import { parseArgs } from 'node:util'
import { pathToFileURL } from 'node:url'
import { loadConfig } from './config'
import type { CliArgs, RunConfig } from './config'
import { GoogleFormsClient } from './google'
import { CanvasClient } from './canvas'
import { runAttendance } from './run'
import type { Providers } from './run'
import { ConfigError, ProviderError, errorMessage } from './errors'
import { writeRecordsCsv, writeReportCsv } from './utils/csv'

const LOG_PREFIX = '[CLI]'

const USAGE = `Grades lecture attendance from the attendance form.

Usage: attendance --assignment-id <id> --date <YYYY-MM-DD> --keyphrase <phrase> [options]

Options:
  --assignment-id <id>   Canvas assignment of the lecture attendance
  --date <YYYY-MM-DD>    Date of the lecture
  --keyphrase <phrase>   Keyphrase presented in class, matched approximately
  --start <HH:mm>        Lecture start (local), overrides LECTURE_START
  --end <HH:mm>          Lecture end (local), overrides LECTURE_END
  --threshold <0-100>    Keyphrase similarity needed, overrides FUZZ_THRESHOLD
  --out-dir <dir>        Where the CSV files go, overrides OUTPUT_DIR
  --dry-run              Compute decisions without posting grades
  -h, --help             Show this help`

export function parseCliArgs(argv: string[]): CliArgs & { help: boolean } {
	const { values } = parseArgs({
		args: argv,
		options: {
			'assignment-id': { type: 'string' },
			date: { type: 'string' },
			keyphrase: { type: 'string' },
			start: { type: 'string' },
			end: { type: 'string' },
			threshold: { type: 'string' },
			'out-dir': { type: 'string' },
			'dry-run': { type: 'boolean', default: false },
			help: { type: 'boolean', short: 'h', default: false },
		},
		strict: true,
	})
	return {
		assignmentId: values['assignment-id'],
		date: values.date,
		keyphrase: values.keyphrase,
		start: values.start,
		end: values.end,
		threshold: values.threshold,
		outDir: values['out-dir'],
		dryRun: values['dry-run'] ?? false,
		help: values.help ?? false,
	}
}

export function createProviders(config: RunConfig): Providers {
	return {
		forms: new GoogleFormsClient({
			formId: config.forms.formId,
			accessToken: config.forms.accessToken,
			timeoutMs: config.httpTimeoutMs,
		}),
		gradebook: new CanvasClient({
			baseUrl: config.canvas.baseUrl,
			token: config.canvas.token,
			courseId: config.canvas.courseId,
			timeoutMs: config.httpTimeoutMs,
		}),
	}
}

/**
 * Runs one attendance pass and returns the process exit code: 0 when the run
 * completed (per-student grading failures included), 1 on a fatal error.
 */
export async function main(
	argv: string[],
	env: NodeJS.ProcessEnv = process.env,
	makeProviders: (config: RunConfig) => Providers = createProviders,
): Promise<number> {
	let config: RunConfig
	try {
		const args = parseCliArgs(argv)
		if (args.help) {
			console.log(USAGE)
			return 0
		}
		config = loadConfig(args, env)
	} catch (err) {
		if (err instanceof ConfigError) {
			for (const issue of err.issues) console.error(LOG_PREFIX, issue)
		} else {
			console.error(LOG_PREFIX, errorMessage(err))
		}
		console.error(USAGE)
		return 1
	}

	try {
		const summary = await runAttendance(config, makeProviders(config))

		const reportPath = await writeReportCsv(config.outputDir, summary.date, summary.report)
		const outPath = await writeRecordsCsv(config.outputDir, summary.date, summary.records, summary.flagged)
		console.log(LOG_PREFIX, 'Wrote', { report: reportPath, records: outPath })

		console.log('Students in need of support:')
		for (const r of summary.flagged) console.log(r.respondentEmail)

		const present = summary.decisions.filter((d) => d.score === 1).length
		console.log(LOG_PREFIX, 'Summary', {
			roster: summary.decisions.length,
			present,
			absent: summary.decisions.length - present,
			submitted: summary.submitted,
			failed: summary.failed.length,
			deprecatedQuestions: summary.warnings.deprecatedQuestions.length,
			skippedTimestamps: summary.warnings.skippedTimestamps.length,
			rejectedKeyphrases: summary.warnings.rejectedKeyphrases,
		})
		return 0
	} catch (err) {
		if (err instanceof ConfigError) {
			for (const issue of err.issues) console.error(LOG_PREFIX, issue)
		} else if (err instanceof ProviderError) {
			console.error(LOG_PREFIX, `${err.provider} request failed`, { status: err.status, message: err.message })
		} else {
			console.error(LOG_PREFIX, 'Run failed', err)
		}
		return 1
	}
}

const entry = process.argv[1]
if (entry && import.meta.url === pathToFileURL(entry).href) {
	dotenv.config()
	main(process.argv.slice(2))
		.then((code) => {
			process.exitCode = code
		})
		.catch((err: unknown) => {
			console.error(LOG_PREFIX, 'Unexpected failure', err)
			process.exitCode = 1
		})
}

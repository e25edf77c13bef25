import { z } from 'zod'
import { DateTime, Info } from 'luxon'
import { ConfigError } from './errors'
import { DEFAULT_FUZZ_THRESHOLD, DEFAULT_KEYPHRASE_FIELD } from './pipeline/keyphrase'
import { DEFAULT_SIGNAL_COLUMNS } from './pipeline/signals'
import { DEFAULT_HELP_THRESHOLD, DEFAULT_RATING_COLUMNS } from './pipeline/assistance'

export interface RunConfig {
	forms: {
		formId: string
		accessToken: string
	}
	canvas: {
		baseUrl: string
		token: string
		courseId: number
	}
	assignmentId: number
	/** Lecture date, YYYY-MM-DD in the lecture time zone */
	date: string
	keyphrase: string
	window: {
		start: string
		end: string
		timeZone: string
		providerTimeZone: string
	}
	fuzzThreshold: number
	keyphraseField: string
	signalColumns: string[]
	ratingColumns: string[]
	helpThreshold: number
	httpTimeoutMs: number
	outputDir: string
	dryRun: boolean
}

/**
 * Parameters given on the command line. They win over the environment.
 */
export interface CliArgs {
	assignmentId?: string
	date?: string
	keyphrase?: string
	start?: string
	end?: string
	threshold?: string
	outDir?: string
	dryRun?: boolean
}

const HH_MM = /^([01]\d|2[0-3]):[0-5]\d$/

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`)

const positiveInt = (name: string) =>
	required(name).regex(/^\d+$/, `${name} must be a positive integer`).transform(Number)

const numberIn = (name: string, min: number, max: number) =>
	z
		.string()
		.trim()
		.transform((s, ctx) => {
			if (!/^\d+(\.\d+)?$/.test(s)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a number` })
				return z.NEVER
			}
			const n = Number(s)
			if (n < min || n > max) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be between ${min} and ${max}` })
				return z.NEVER
			}
			return n
		})

const time = (name: string) => z.string().trim().regex(HH_MM, `${name} must be HH:mm`)

const zone = (name: string) => z.string().trim().refine((v) => Info.isValidIANAZone(v), `${name} is not a known time zone`)

const list = z
	.string()
	.transform((s) => s.split(',').map((x) => x.trim()).filter(Boolean))

const configSchema = z
	.object({
		GOOGLE_FORM_ID: required('GOOGLE_FORM_ID'),
		GOOGLE_ACCESS_TOKEN: required('GOOGLE_ACCESS_TOKEN'),
		CANVAS_API_URL: required('CANVAS_API_URL').url('CANVAS_API_URL must be a URL'),
		CANVAS_TOKEN: required('CANVAS_TOKEN'),
		CANVAS_COURSE_ID: positiveInt('CANVAS_COURSE_ID'),
		assignmentId: positiveInt('--assignment-id'),
		date: required('--date').refine(
			(d) => DateTime.fromFormat(d, 'yyyy-MM-dd').isValid,
			'--date must be a YYYY-MM-DD calendar date',
		),
		keyphrase: required('--keyphrase'),
		LECTURE_START: time('LECTURE_START').default('13:00'),
		LECTURE_END: time('LECTURE_END').default('14:00'),
		LECTURE_TIMEZONE: zone('LECTURE_TIMEZONE').default('America/Los_Angeles'),
		PROVIDER_TIMEZONE: zone('PROVIDER_TIMEZONE').default('UTC'),
		FUZZ_THRESHOLD: numberIn('FUZZ_THRESHOLD', 0, 100).default(String(DEFAULT_FUZZ_THRESHOLD)),
		KEYPHRASE_FIELD: z.string().trim().min(1).default(DEFAULT_KEYPHRASE_FIELD),
		SIGNAL_COLUMNS: list.default(DEFAULT_SIGNAL_COLUMNS.join(',')),
		RATING_COLUMNS: list.default(DEFAULT_RATING_COLUMNS.join(',')),
		HELP_THRESHOLD: numberIn('HELP_THRESHOLD', 0, 100).default(String(DEFAULT_HELP_THRESHOLD)),
		HTTP_TIMEOUT_MS: positiveInt('HTTP_TIMEOUT_MS').default('30000'),
		OUTPUT_DIR: z.string().trim().min(1).default('.'),
		dryRun: z.boolean().default(false),
	})
	.refine((c) => !HH_MM.test(c.LECTURE_START) || !HH_MM.test(c.LECTURE_END) || c.LECTURE_START < c.LECTURE_END, {
		message: 'lecture end must be after lecture start',
		path: ['LECTURE_END'],
	})
	.superRefine((c, ctx) => {
		// a rating column is only compared once signal extraction made it numeric
		for (const rating of c.RATING_COLUMNS) {
			if (!c.SIGNAL_COLUMNS.some((signal) => rating.includes(signal))) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: `RATING_COLUMNS entry "${rating}" is not covered by SIGNAL_COLUMNS`,
					path: ['RATING_COLUMNS'],
				})
			}
		}
	})

function blankToUndefined(value: string | undefined): string | undefined {
	return value === undefined || value.trim() === '' ? undefined : value
}

/**
 * Merges the environment with command-line arguments and validates the
 * result. Throws ConfigError listing every problem found.
 */
export function loadConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): RunConfig {
	const input = {
		GOOGLE_FORM_ID: blankToUndefined(env.GOOGLE_FORM_ID),
		GOOGLE_ACCESS_TOKEN: blankToUndefined(env.GOOGLE_ACCESS_TOKEN),
		CANVAS_API_URL: blankToUndefined(env.CANVAS_API_URL),
		CANVAS_TOKEN: blankToUndefined(env.CANVAS_TOKEN),
		CANVAS_COURSE_ID: blankToUndefined(env.CANVAS_COURSE_ID),
		assignmentId: blankToUndefined(args.assignmentId),
		date: blankToUndefined(args.date),
		keyphrase: blankToUndefined(args.keyphrase),
		LECTURE_START: blankToUndefined(args.start ?? env.LECTURE_START),
		LECTURE_END: blankToUndefined(args.end ?? env.LECTURE_END),
		LECTURE_TIMEZONE: blankToUndefined(env.LECTURE_TIMEZONE),
		PROVIDER_TIMEZONE: blankToUndefined(env.PROVIDER_TIMEZONE),
		FUZZ_THRESHOLD: blankToUndefined(args.threshold ?? env.FUZZ_THRESHOLD),
		KEYPHRASE_FIELD: blankToUndefined(env.KEYPHRASE_FIELD),
		SIGNAL_COLUMNS: blankToUndefined(env.SIGNAL_COLUMNS),
		RATING_COLUMNS: blankToUndefined(env.RATING_COLUMNS),
		HELP_THRESHOLD: blankToUndefined(env.HELP_THRESHOLD),
		HTTP_TIMEOUT_MS: blankToUndefined(env.HTTP_TIMEOUT_MS),
		OUTPUT_DIR: blankToUndefined(args.outDir ?? env.OUTPUT_DIR),
		dryRun: args.dryRun,
	}
	const parsed = configSchema.safeParse(input)
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map((i) => i.message))
	}
	const c = parsed.data
	return {
		forms: { formId: c.GOOGLE_FORM_ID, accessToken: c.GOOGLE_ACCESS_TOKEN },
		canvas: { baseUrl: c.CANVAS_API_URL, token: c.CANVAS_TOKEN, courseId: c.CANVAS_COURSE_ID },
		assignmentId: c.assignmentId,
		date: c.date,
		keyphrase: c.keyphrase,
		window: {
			start: c.LECTURE_START,
			end: c.LECTURE_END,
			timeZone: c.LECTURE_TIMEZONE,
			providerTimeZone: c.PROVIDER_TIMEZONE,
		},
		fuzzThreshold: c.FUZZ_THRESHOLD,
		keyphraseField: c.KEYPHRASE_FIELD,
		signalColumns: c.SIGNAL_COLUMNS,
		ratingColumns: c.RATING_COLUMNS,
		helpThreshold: c.HELP_THRESHOLD,
		httpTimeoutMs: c.HTTP_TIMEOUT_MS,
		outputDir: c.OUTPUT_DIR,
		dryRun: c.dryRun,
	}
}

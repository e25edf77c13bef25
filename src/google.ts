import { z } from 'zod'
import type { FormsProvider, QuestionSchema, RawSubmission } from './types'
import { fetchJson, parsePayload } from './utils/http'
import type { HttpClientOptions } from './utils/http'
import type { RetryOptions } from './utils/retry'
import { flatten } from './utils/flatten'

const FORMS_API = 'https://forms.googleapis.com/v1'
const LOG_PREFIX = '[Google]'

const formItemSchema = z.object({
	itemId: z.string().optional(),
	title: z.string().default(''),
	questionItem: z
		.object({
			question: z.object({ questionId: z.string() }),
		})
		.optional(),
})

const formSchema = z.object({
	formId: z.string().optional(),
	info: z.object({ title: z.string().optional() }).optional(),
	items: z.array(formItemSchema).default([]),
})

export type FormBody = z.infer<typeof formSchema>

const responsePageSchema = z.object({
	responses: z.array(z.record(z.unknown())).default([]),
	nextPageToken: z.string().optional(),
})

export interface GoogleFormsOptions {
	formId: string
	accessToken: string
	timeoutMs: number
	retry?: RetryOptions
}

/**
 * Question schema of the current form version. Items that are not questions
 * (page breaks, text, images) carry no question id and are skipped.
 */
export function questionSchemaFromForm(form: FormBody): QuestionSchema {
	const schema: QuestionSchema = new Map()
	const seenTitles = new Set<string>()
	for (const item of form.items) {
		const questionId = item.questionItem?.question.questionId
		if (!questionId) continue
		if (seenTitles.has(item.title)) {
			console.warn(LOG_PREFIX, 'Duplicate question title in form', { title: item.title, questionId })
		}
		seenTitles.add(item.title)
		schema.set(questionId, item.title)
	}
	return schema
}

export class GoogleFormsClient implements FormsProvider {
	private readonly http: HttpClientOptions
	private readonly formId: string

	constructor(options: GoogleFormsOptions) {
		this.formId = options.formId
		this.http = {
			provider: 'google',
			logPrefix: LOG_PREFIX,
			token: options.accessToken,
			timeoutMs: options.timeoutMs,
			retry: options.retry,
		}
	}

	async getFormBody(): Promise<FormBody> {
		const url = `${FORMS_API}/forms/${encodeURIComponent(this.formId)}`
		const { data } = await fetchJson(this.http, url)
		return parsePayload('google', formSchema, data, 'form')
	}

	async fetchSchema(): Promise<QuestionSchema> {
		const body = await this.getFormBody()
		const schema = questionSchemaFromForm(body)
		console.log(LOG_PREFIX, 'Question schema loaded', { title: body.info?.title, questions: schema.size })
		return schema
	}

	async fetchSubmissions(): Promise<RawSubmission[]> {
		const submissions: RawSubmission[] = []
		let pageToken: string | undefined
		do {
			const params = new URLSearchParams()
			if (pageToken) params.set('pageToken', pageToken)
			const query = params.toString()
			const url = `${FORMS_API}/forms/${encodeURIComponent(this.formId)}/responses${query ? `?${query}` : ''}`
			const { data } = await fetchJson(this.http, url)
			const page = parsePayload('google', responsePageSchema, data, 'responses')
			for (const response of page.responses) submissions.push(flatten(response))
			pageToken = page.nextPageToken
		} while (pageToken)
		console.log(LOG_PREFIX, 'Responses loaded', { count: submissions.length })
		return submissions
	}
}

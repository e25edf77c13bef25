import { z } from 'zod'
import type { AssignmentHandle, GradebookProvider, RosterEntry, Score } from './types'
import { fetchJson, nextLink, parsePayload } from './utils/http'
import type { HttpClientOptions } from './utils/http'
import type { RetryOptions } from './utils/retry'

const LOG_PREFIX = '[Canvas]'

const userSchema = z.object({
	id: z.number(),
	name: z.string().default(''),
	login_id: z.string().nullish(),
})

const profileSchema = z.object({
	id: z.number(),
	name: z.string().default(''),
	login_id: z.string().nullish(),
	primary_email: z.string().nullish(),
})

const assignmentSchema = z.object({
	id: z.number(),
	name: z.string().default(''),
	points_possible: z.number().nullish(),
})

export interface CanvasOptions {
	baseUrl: string
	token: string
	courseId: number
	timeoutMs: number
	retry?: RetryOptions
}

export function normalizeBaseUrl(value: string): string {
	return value.trim().replace(/\/+$/, '').replace(/\/api\/v1$/i, '')
}

export class CanvasClient implements GradebookProvider {
	private readonly http: HttpClientOptions
	private readonly baseUrl: string
	private readonly courseId: number

	constructor(options: CanvasOptions) {
		this.baseUrl = normalizeBaseUrl(options.baseUrl)
		this.courseId = options.courseId
		this.http = {
			provider: 'canvas',
			logPrefix: LOG_PREFIX,
			token: options.token,
			timeoutMs: options.timeoutMs,
			retry: options.retry,
		}
	}

	private courseUrl(path: string): string {
		return `${this.baseUrl}/api/v1/courses/${this.courseId}${path}`
	}

	async listRoster(): Promise<RosterEntry[]> {
		console.log(LOG_PREFIX, 'Generating user list! This might take a while...')
		const entries: RosterEntry[] = []
		let url: string | null = this.courseUrl('/users?enrollment_type[]=student&per_page=100')
		while (url) {
			const res = await fetchJson(this.http, url)
			const users = parsePayload('canvas', z.array(userSchema), res.data, 'users')
			for (const user of users) {
				const loginId = user.login_id || (await this.getLoginId(user.id))
				if (!loginId) {
					console.warn(LOG_PREFIX, 'Student has no login id; cannot be matched', { userId: user.id, name: user.name })
				}
				entries.push({ id: user.id, loginId, displayName: user.name })
			}
			url = nextLink(res.headers.get('link'))
		}
		console.log(LOG_PREFIX, 'Roster loaded', { students: entries.length })
		return entries
	}

	/**
	 * Course user listings omit login_id unless the token may see it; the
	 * profile endpoint always carries it.
	 */
	async getLoginId(userId: number): Promise<string> {
		const { data } = await fetchJson(this.http, `${this.baseUrl}/api/v1/users/${userId}/profile`)
		const profile = parsePayload('canvas', profileSchema, data, 'profile')
		return profile.login_id || profile.primary_email || ''
	}

	async getAssignment(id: number): Promise<AssignmentHandle> {
		const { data } = await fetchJson(this.http, this.courseUrl(`/assignments/${id}`))
		const assignment = parsePayload('canvas', assignmentSchema, data, 'assignment')
		console.log(LOG_PREFIX, 'Assignment loaded', { id: assignment.id, name: assignment.name })
		return {
			id: assignment.id,
			name: assignment.name,
			pointsPossible: assignment.points_possible ?? undefined,
		}
	}

	async submitDecision(assignment: AssignmentHandle, entry: RosterEntry, score: Score): Promise<void> {
		const userinfo = score === 0 ? 'Marking absent: ' : 'Marking present: '
		console.log(LOG_PREFIX, `${userinfo}${entry.displayName}`, { userId: entry.id })
		await fetchJson(this.http, this.courseUrl(`/assignments/${assignment.id}/submissions/${entry.id}`), {
			method: 'PUT',
			body: JSON.stringify({ submission: { posted_grade: score } }),
		})
	}
}

import { z } from 'zod'
import { ProviderError, errorMessage } from '../errors'
import type { ProviderName } from '../errors'
import { withRetry } from './retry'
import type { RetryOptions } from './retry'

export interface HttpClientOptions {
	provider: ProviderName
	logPrefix: string
	token: string
	timeoutMs: number
	retry?: RetryOptions
}

export interface JsonResponse {
	status: number
	data: unknown
	headers: Headers
}

function previewBody(body: RequestInit['body']): string | undefined {
	if (typeof body !== 'string') return undefined
	return body.slice(0, 300)
}

/**
 * Bearer-authenticated JSON request with a timeout. Transient failures
 * (network, timeout, 429, 5xx) are retried, anything else throws ProviderError.
 */
export async function fetchJson(client: HttpClientOptions, url: string, init?: RequestInit): Promise<JsonResponse> {
	const method = init?.method || 'GET'
	return withRetry(async () => {
		console.log(client.logPrefix, 'HTTP', method, url, { bodyPreview: previewBody(init?.body) })
		let res: Response
		try {
			res = await fetch(url, {
				...init,
				headers: {
					'Content-Type': 'application/json',
					Authorization: `Bearer ${client.token}`,
					...(init?.headers || {}),
				},
				signal: AbortSignal.timeout(client.timeoutMs),
			})
		} catch (err) {
			console.error(client.logPrefix, 'HTTP request failed', method, url, errorMessage(err))
			throw new ProviderError({
				provider: client.provider,
				message: `${method} ${url} failed: ${errorMessage(err)}`,
				cause: err,
			})
		}
		const status = res.status
		if (!res.ok) {
			const text = await res.text().catch(() => '')
			console.error(client.logPrefix, 'HTTP error', status, text || res.statusText)
			throw new ProviderError({
				provider: client.provider,
				message: `HTTP ${status}: ${text || res.statusText}`,
				status,
				body: text,
			})
		}
		const raw = await res.text()
		let data: unknown = null
		if (raw) {
			try {
				data = JSON.parse(raw)
			} catch (err) {
				throw new ProviderError({
					provider: client.provider,
					message: `${method} ${url} returned invalid JSON`,
					status,
					body: raw.slice(0, 300),
					cause: err,
				})
			}
		}
		console.log(client.logPrefix, 'HTTP', status, 'OK')
		return { status, data, headers: res.headers }
	}, client.retry)
}

/**
 * Picks the rel="next" target out of an RFC 8288 Link header.
 */
export function nextLink(header: string | null): string | null {
	if (!header) return null
	for (const part of header.split(',')) {
		const m = part.match(/<([^>]+)>\s*;\s*rel="?next"?/)
		if (m && m[1]) return m[1]
	}
	return null
}

export function parsePayload<T extends z.ZodTypeAny>(provider: ProviderName, schema: T, data: unknown, what: string): z.infer<T> {
	const parsed = schema.safeParse(data)
	if (!parsed.success) {
		throw new ProviderError({
			provider,
			message: `Unexpected ${what} payload: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
		})
	}
	return parsed.data
}

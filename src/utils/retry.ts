import { ProviderError, errorMessage } from '../errors'

const LOG_PREFIX = '[Retry]'

export interface RetryOptions {
	maxRetries?: number
	initialDelayMs?: number
	maxDelayMs?: number
	/** Overridable so tests do not wait on real timers */
	sleep?: (ms: number) => Promise<void>
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
	maxRetries: 3,
	initialDelayMs: 1000,
	maxDelayMs: 8000,
	sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
}

export function isRetryable(error: unknown): boolean {
	if (error instanceof ProviderError) return error.retryable
	return false
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
	const opts = { ...DEFAULT_OPTIONS, ...options }
	let lastError: unknown = null

	for (let attempt = 1; attempt <= opts.maxRetries; attempt++) {
		try {
			return await fn()
		} catch (error) {
			lastError = error
			if (!isRetryable(error)) throw error

			if (attempt < opts.maxRetries) {
				const jitter = Math.random() * 500
				const delay = Math.min(opts.initialDelayMs * Math.pow(2, attempt - 1) + jitter, opts.maxDelayMs)
				console.log(LOG_PREFIX, `Attempt ${attempt}/${opts.maxRetries} failed: ${errorMessage(error)}. Retrying in ${Math.round(delay)}ms...`)
				await opts.sleep(delay)
			} else {
				console.error(LOG_PREFIX, `All ${opts.maxRetries} attempts failed`)
			}
		}
	}

	throw lastError
}

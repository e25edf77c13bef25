export type ProviderName = 'google' | 'canvas'

export class ProviderError extends Error {
	provider: ProviderName
	/** HTTP status, 0 when the request never got a response */
	status: number
	body: string

	constructor(input: { provider: ProviderName; message: string; status?: number; body?: string; cause?: unknown }) {
		super(input.message, { cause: input.cause })
		this.name = 'ProviderError'
		this.provider = input.provider
		this.status = Number(input.status || 0)
		this.body = input.body || ''
	}

	get retryable(): boolean {
		return this.status === 0 || this.status === 429 || this.status >= 500
	}
}

export class ConfigError extends Error {
	issues: string[]

	constructor(issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`)
		this.name = 'ConfigError'
		this.issues = issues
	}
}

export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message
	return String(err)
}

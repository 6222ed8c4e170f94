import type { z } from 'zod'
import {
	AuthenticationError,
	DataNotFoundError,
	type ProviderError,
	ProviderUnavailableError,
	RateLimitError,
	toProviderError,
} from '../core/errors.js'
import type { ProviderContext, RateLimitConfig } from './types.js'

export interface CallSpec {
	source: string
	symbol?: string
	rateLimits: RateLimitConfig
	/** Present when the source needs credentials */
	credential?: { value: string | undefined; envVar: string }
}

/**
 * Runs one adapter call under the shared contract:
 * missing credentials fail before anything else, an open breaker or an empty
 * bucket fail without touching the network, and the outcome of the call itself
 * is reported to the breaker. Not-found and insufficient-data failures leave
 * the breaker untouched since the source did answer.
 */
export async function guardedCall<T>(
	ctx: ProviderContext,
	spec: CallSpec,
	call: () => Promise<T>,
): Promise<T> {
	const { source, symbol } = spec
	if (spec.credential && !spec.credential.value) {
		throw new AuthenticationError(source, `${spec.credential.envVar} not set`, symbol)
	}

	const breaker = ctx.breakers.get(source)
	if (!breaker.allowRequest()) {
		throw new ProviderUnavailableError(source, 'Circuit breaker OPEN', symbol)
	}

	if (!ctx.limiters.get(source, spec.rateLimits).acquire()) {
		throw new RateLimitError(source, 'Rate limit exceeded', symbol, { local: true })
	}

	let result: T
	try {
		result = await call()
	} catch (err) {
		const error: ProviderError = toProviderError(source, err, symbol)
		if (error.countsAsFailure) breaker.recordFailure()
		throw error
	}
	breaker.recordSuccess()
	return result
}

/**
 * Spends one more token for a request that makes a second upstream call.
 * A refusal is local and leaves the breaker untouched.
 */
export function acquireAdditionalToken(ctx: ProviderContext, spec: CallSpec): void {
	if (!ctx.limiters.get(spec.source, spec.rateLimits).acquire()) {
		throw new RateLimitError(spec.source, 'Rate limit exceeded on follow-up call', spec.symbol, { local: true })
	}
}

function isTimeout(err: unknown): boolean {
	return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
}

/** Maps a non-2xx HTTP status onto the error taxonomy. */
export function errorForStatus(source: string, status: number, symbol?: string): ProviderError {
	if (status === 429) return new RateLimitError(source, 'HTTP 429', symbol)
	if (status === 401 || status === 403) return new AuthenticationError(source, `HTTP ${status}`, symbol)
	if (status === 404) return new DataNotFoundError(source, 'HTTP 404', symbol)
	return new ProviderUnavailableError(source, `HTTP ${status}`, symbol)
}

async function request(
	ctx: ProviderContext,
	source: string,
	url: URL,
	symbol?: string,
): Promise<Response> {
	let res: Response
	try {
		res = await ctx.fetch(url, { signal: AbortSignal.timeout(ctx.config.requestTimeoutMs) })
	} catch (err) {
		const reason = isTimeout(err)
			? 'Request timeout'
			: `Connection failed: ${err instanceof Error ? err.message : String(err)}`
		throw new ProviderUnavailableError(source, reason, symbol, { cause: err })
	}
	if (!res.ok) throw errorForStatus(source, res.status, symbol)
	return res
}

export async function fetchJson(
	ctx: ProviderContext,
	source: string,
	url: URL,
	symbol?: string,
): Promise<unknown> {
	const res = await request(ctx, source, url, symbol)
	try {
		return await res.json()
	} catch (err) {
		throw new ProviderUnavailableError(source, 'Malformed JSON response', symbol, { cause: err })
	}
}

export async function fetchText(
	ctx: ProviderContext,
	source: string,
	url: URL,
	symbol?: string,
): Promise<string> {
	const res = await request(ctx, source, url, symbol)
	return res.text()
}

/** Validates an upstream payload; a shape mismatch means the upstream changed or is misbehaving. */
export function parsePayload<S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	source: string,
	symbol?: string,
): z.infer<S> {
	const result = schema.safeParse(data)
	if (!result.success) {
		throw new ProviderUnavailableError(source, 'Unexpected payload shape', symbol, { cause: result.error })
	}
	return result.data
}

export function nowIso(): string {
	return new Date().toISOString()
}

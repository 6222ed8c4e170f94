import type { Capability } from '../types.js'

export type ProviderErrorKind =
	| 'rate_limited'
	| 'unauthenticated'
	| 'not_found'
	| 'insufficient_data'
	| 'unavailable'

/**
 * Base class for every failure an adapter raises. The orchestrator catches
 * these while walking a chain and decides between failover and stale cache.
 */
export abstract class ProviderError extends Error {
	abstract readonly kind: ProviderErrorKind
	readonly source: string
	readonly symbol?: string

	constructor(source: string, message: string, symbol?: string, options?: { cause?: unknown }) {
		super(`[${source}] ${message}${symbol ? ` (symbol=${symbol})` : ''}`, options)
		this.name = new.target.name
		this.source = source
		this.symbol = symbol
	}

	/** Whether this failure says anything about the health of the upstream. */
	get countsAsFailure(): boolean {
		return this.kind !== 'not_found' && this.kind !== 'insufficient_data'
	}
}

export class RateLimitError extends ProviderError {
	readonly kind = 'rate_limited'
	/** Refused by our own limiter; the upstream never saw the request. */
	readonly local: boolean

	constructor(
		source: string,
		message: string,
		symbol?: string,
		options?: { cause?: unknown; local?: boolean },
	) {
		super(source, message, symbol, options)
		this.local = options?.local ?? false
	}

	override get countsAsFailure(): boolean {
		return !this.local
	}
}

export class AuthenticationError extends ProviderError {
	readonly kind = 'unauthenticated'
}

export class DataNotFoundError extends ProviderError {
	readonly kind = 'not_found'
}

export class InsufficientDataError extends ProviderError {
	readonly kind = 'insufficient_data'
}

export class ProviderUnavailableError extends ProviderError {
	readonly kind = 'unavailable'
}

export interface FailureReason {
	source: string
	kind: ProviderErrorKind
	message: string
}

export class AllSourcesExhaustedError extends Error {
	readonly kind = 'all_sources_exhausted'
	readonly capability: Capability
	readonly symbol: string
	readonly reasons: FailureReason[]

	constructor(capability: Capability, symbol: string, reasons: FailureReason[]) {
		super(
			`All sources exhausted for ${capability} (${symbol}): ${reasons.length} source${reasons.length === 1 ? '' : 's'} failed and no cached copy exists`,
		)
		this.name = 'AllSourcesExhaustedError'
		this.capability = capability
		this.symbol = symbol
		this.reasons = reasons
	}
}

/** Wraps anything that is not already a ProviderError as an unavailable-class failure. */
export function toProviderError(source: string, err: unknown, symbol?: string): ProviderError {
	if (err instanceof ProviderError) return err
	const message = err instanceof Error ? err.message : String(err)
	return new ProviderUnavailableError(source, message, symbol, { cause: err })
}

export function toFailureReason(err: ProviderError): FailureReason {
	return { source: err.source, kind: err.kind, message: err.message }
}

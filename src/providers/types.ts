import type { AppConfig } from '../core/config.js'
import type { BreakerRegistry } from '../core/circuit-breaker.js'
import type { Logger } from '../core/logger.js'
import type { LimiterRegistry } from '../core/rate-limiter.js'
import type {
	Capability,
	EarningsResult,
	FundamentalsField,
	FundamentalsResult,
	OhlcvResult,
	QuoteResult,
	SecurityInfoResult,
} from '../types.js'

export interface RateLimitConfig {
	perMinute: number
	/** 0 or absent means no daily ceiling */
	perDay?: number
}

export type IntradayInterval = '5m' | '15m' | '30m' | '1h'

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>

/** Shared collaborators handed to every adapter factory. */
export interface ProviderContext {
	config: AppConfig
	breakers: BreakerRegistry
	limiters: LimiterRegistry
	logger: Logger
	fetch: FetchFn
}

/**
 * One upstream source. Each adapter implements the capability methods it
 * lists in `capabilities`; every method either resolves with a normalized
 * result or rejects with exactly one ProviderError.
 */
export interface Provider {
	name: string
	requiresKey: boolean
	keyEnvVar?: string
	capabilities: Capability[]
	/** Lower runs first within a capability's chain */
	priority: Partial<Record<Capability, number>>
	rateLimits: RateLimitConfig
	/** Fields this source never supplies, which a narrower secondary request should fill */
	knownGaps?: FundamentalsField[]
	isEnabled(): boolean

	getPriceHistory?(symbol: string, period: string): Promise<OhlcvResult>
	getIntraday?(symbol: string, interval: IntradayInterval, period: string): Promise<OhlcvResult>
	getFundamentals?(symbol: string): Promise<FundamentalsResult>
	/** Narrow request costing a single upstream call, returning only `fields` */
	getFundamentalsFields?(symbol: string, fields: FundamentalsField[]): Promise<FundamentalsResult>
	getQuote?(symbol: string): Promise<QuoteResult>
	getSecurityInfo?(symbol: string): Promise<SecurityInfoResult>
	getNextEarnings?(symbol: string): Promise<EarningsResult>
}

export type ProviderFactory = (ctx: ProviderContext) => Provider

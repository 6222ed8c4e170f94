import { z } from 'zod'
import { FUNDAMENTALS_SCHEMA_VERSION, countFilled } from '../providers/field-maps.js'
import {
	buildProviders,
	chainFor,
	defaultProviderFactories,
	describeProvider,
	type ProviderDescription,
} from '../providers/registry.js'
import type { FetchFn, IntradayInterval, Provider, ProviderContext, ProviderFactory } from '../providers/types.js'
import {
	CACHE_SOURCE,
	type Capability,
	emptyFundamentals,
	type EarningsResult,
	type FieldSources,
	type FundamentalsField,
	type FundamentalsResult,
	FUNDAMENTALS_FIELDS,
	type OhlcvResult,
	type QuoteResult,
	type SecurityInfoResult,
	STALE_CACHE_SOURCE,
} from '../types.js'
import { periodToDays } from './bars.js'
import {
	type CacheEntry,
	type CacheStats,
	CacheStore,
	fundamentalsKey,
	ohlcvKey,
	type PutOptions,
} from './cache.js'
import { BreakerRegistry, type BreakerStatus } from './circuit-breaker.js'
import { type AppConfig, getConfigProblem, loadConfig } from './config.js'
import {
	AllSourcesExhaustedError,
	type FailureReason,
	ProviderUnavailableError,
	toFailureReason,
	toProviderError,
} from './errors.js'
import { createLogger, type Logger } from './logger.js'
import { fundamentalsExpiry, ohlcvExpiry } from './market-calendar.js'
import { LimiterRegistry, type LimiterStatus } from './rate-limiter.js'

export const INTRADAY_INTERVALS: readonly IntradayInterval[] = ['5m', '15m', '30m', '1h']

const barSchema = z.object({
	timestamp: z.string(),
	open: z.number(),
	high: z.number(),
	low: z.number(),
	close: z.number(),
	volume: z.number(),
})

const ohlcvPayloadSchema = z.object({
	symbol: z.string(),
	period: z.string(),
	source: z.string(),
	bars: z.array(barSchema),
	rows: z.number(),
	fetchedAt: z.string(),
})

const fundamentalsPayloadSchema = z.object({
	symbol: z.string(),
	source: z.string(),
	data: z.record(z.string(), z.number().nullable()),
	fieldSources: z.record(z.string(), z.string()),
	fetchedAt: z.string(),
})

export interface OrchestratorStatus {
	breakers: Record<string, BreakerStatus>
	limiters: Record<string, LimiterStatus>
	providers: ProviderDescription[]
	/** Last source that answered, keyed `SYMBOL:capability` */
	lastSource: Record<string, string>
	cache: CacheStats
}

export type WarmOutcome = { symbol: string; capability: 'priceHistory' | 'fundamentals' } & (
	| { ok: true; source: string }
	| { ok: false; error: string }
)

export interface OrchestratorOptions {
	config?: AppConfig
	logger?: Logger
	cache?: CacheStore
	fetch?: FetchFn
	providers?: ProviderFactory[]
}

type ChainOutcome<T> =
	| { ok: true; value: T; provider: Provider }
	| { ok: false; reasons: FailureReason[] }

export function normalizeSymbol(symbol: string): string {
	const s = symbol.trim().toUpperCase()
	if (!s) throw new Error('Symbol must not be empty')
	return s
}

function assertPeriod(period: string): void {
	// Throws on malformed input before any adapter is charged a token
	periodToDays(period)
}

/**
 * Single entry point per capability. Price history and fundamentals are
 * cache-first with a stale-cache fallback; the other capabilities walk their
 * chain on every call.
 */
export class DataOrchestrator {
	private readonly log: Logger
	private readonly lastSource = new Map<string, string>()

	constructor(
		readonly config: AppConfig,
		private readonly cache: CacheStore,
		private readonly providers: Provider[],
		private readonly breakers: BreakerRegistry,
		private readonly limiters: LimiterRegistry,
		readonly logger: Logger,
	) {
		this.log = logger.child({ component: 'orchestrator' })
	}

	chain(capability: Capability): Provider[] {
		return chainFor(this.providers, capability)
	}

	// ── price history ──────────────────────────────────────────────

	async getOhlcv(symbol: string, period = '2y'): Promise<OhlcvResult> {
		const sym = normalizeSymbol(symbol)
		assertPeriod(period)
		const key = ohlcvKey(sym)

		const fresh = this.cache.getFreshEntry(key)
		const cached = fresh && this.coversPeriod(fresh, period) ? this.readOhlcv(fresh) : undefined
		if (cached) {
			this.log.debug({ key, period }, 'cache hit')
			this.cache.recordLookup(key, 'fresh_hit')
			return this.served(sym, 'priceHistory', { ...cached, source: CACHE_SOURCE })
		}
		this.cache.recordLookup(key, 'miss')

		const outcome = await this.walk('priceHistory', sym, (p) => p.getPriceHistory?.(sym, period))
		if (outcome.ok) {
			const result = outcome.value
			this.store(key, result, {
				source: result.source,
				expiresAt: ohlcvExpiry(new Date(), this.config.ohlcvExpiryBufferMinutes, this.config.market),
				meta: { period, rows: result.rows },
			})
			return result
		}

		const staleEntry = this.cache.getStaleEntry(key)
		const stale = staleEntry && this.readOhlcv(staleEntry)
		if (stale) {
			this.log.warn({ symbol: sym, capability: 'priceHistory' }, 'all sources failed, serving stale cache')
			this.cache.recordLookup(key, 'stale_hit')
			return this.served(sym, 'priceHistory', { ...stale, source: STALE_CACHE_SOURCE })
		}
		throw new AllSourcesExhaustedError('priceHistory', sym, outcome.reasons)
	}

	/** Chain walk for daily bars without reading or writing the cache. */
	async fetchOhlcvDirect(symbol: string, period: string): Promise<OhlcvResult> {
		const sym = normalizeSymbol(symbol)
		assertPeriod(period)
		const outcome = await this.walk('priceHistory', sym, (p) => p.getPriceHistory?.(sym, period))
		if (outcome.ok) return outcome.value
		throw new AllSourcesExhaustedError('priceHistory', sym, outcome.reasons)
	}

	/** Intraday bars are never cached. */
	async getIntraday(symbol: string, interval: IntradayInterval = '1h', period = '60d'): Promise<OhlcvResult> {
		const sym = normalizeSymbol(symbol)
		assertPeriod(period)
		if (!INTRADAY_INTERVALS.includes(interval)) {
			throw new Error(`Unsupported interval "${interval}" (expected ${INTRADAY_INTERVALS.join(', ')})`)
		}
		return this.uncached('intraday', sym, (p) => p.getIntraday?.(sym, interval, period))
	}

	// ── fundamentals ───────────────────────────────────────────────

	/**
	 * Field-level merge across the fundamentals chain. The first adapter is
	 * primary. The second fills only the primary's known gaps through its
	 * narrow request, or runs in full when the primary failed outright. Every
	 * later adapter is consulted only while a field is still null. A filled
	 * field is never overwritten.
	 */
	async getFundamentals(symbol: string): Promise<FundamentalsResult> {
		const sym = normalizeSymbol(symbol)
		const key = fundamentalsKey(sym)
		const versioned = { schemaVersion: FUNDAMENTALS_SCHEMA_VERSION }

		const fresh = this.cache.getFreshEntry(key, versioned)
		const cached = fresh && this.readFundamentals(fresh)
		if (cached) {
			this.log.debug({ key }, 'cache hit')
			this.cache.recordLookup(key, 'fresh_hit')
			return this.served(sym, 'fundamentals', { ...cached, source: CACHE_SOURCE })
		}
		this.cache.recordLookup(key, 'miss')

		const data = emptyFundamentals()
		const fieldSources: FieldSources = {}
		const reasons: FailureReason[] = []
		const answered: string[] = []

		const fill = (result: FundamentalsResult, source: string, only?: FundamentalsField[]): void => {
			if (!answered.includes(source)) answered.push(source)
			for (const field of only ?? FUNDAMENTALS_FIELDS) {
				const value = result.data[field]
				if (data[field] === null && value !== null) {
					data[field] = value
					fieldSources[field] = source
				}
			}
		}

		const attempt = async (
			provider: Provider,
			request: (p: Provider) => Promise<FundamentalsResult> | undefined,
		): Promise<FundamentalsResult | undefined> => {
			try {
				return await this.invoke(provider, 'fundamentals', sym, request)
			} catch (err) {
				reasons.push(this.failure(provider, 'fundamentals', sym, err))
				return undefined
			}
		}

		const [primary, secondary, ...fallbacks] = this.chain('fundamentals')

		const primaryResult = primary && (await attempt(primary, (p) => p.getFundamentals?.(sym)))
		if (primary && primaryResult) fill(primaryResult, primary.name)

		if (secondary) {
			if (primary && primaryResult) {
				const gaps = (primary.knownGaps ?? []).filter((f) => data[f] === null)
				if (gaps.length > 0) {
					const narrow = secondary.getFundamentalsFields !== undefined
					const gapResult = await attempt(secondary, (p) =>
						narrow ? p.getFundamentalsFields?.(sym, gaps) : p.getFundamentals?.(sym),
					)
					if (gapResult) fill(gapResult, secondary.name, gaps)
				}
			} else {
				const full = await attempt(secondary, (p) => p.getFundamentals?.(sym))
				if (full) fill(full, secondary.name)
			}
		}

		for (const fallback of fallbacks) {
			if (countFilled(data) === FUNDAMENTALS_FIELDS.length) break
			const result = await attempt(fallback, (p) => p.getFundamentals?.(sym))
			if (result) fill(result, fallback.name)
		}

		if (answered.length > 0 && countFilled(data) > 0) {
			const result: FundamentalsResult = {
				symbol: sym,
				source: answered[0],
				data,
				fieldSources,
				fetchedAt: new Date().toISOString(),
			}
			this.log.debug(
				{ symbol: sym, filled: countFilled(data), fieldSources },
				'fundamentals merged',
			)
			this.store(key, result, {
				source: result.source,
				expiresAt: fundamentalsExpiry(new Date(), this.config.fundamentalsTtlDays),
				schemaVersion: FUNDAMENTALS_SCHEMA_VERSION,
			})
			return this.served(sym, 'fundamentals', result)
		}

		const staleEntry = this.cache.getStaleEntry(key, versioned)
		const stale = staleEntry && this.readFundamentals(staleEntry)
		if (stale) {
			this.log.warn({ symbol: sym, capability: 'fundamentals' }, 'all sources failed, serving stale cache')
			this.cache.recordLookup(key, 'stale_hit')
			return this.served(sym, 'fundamentals', { ...stale, source: STALE_CACHE_SOURCE })
		}
		throw new AllSourcesExhaustedError('fundamentals', sym, reasons)
	}

	// ── uncached capabilities ──────────────────────────────────────

	async getQuote(symbol: string): Promise<QuoteResult> {
		const sym = normalizeSymbol(symbol)
		return this.uncached('quote', sym, (p) => p.getQuote?.(sym))
	}

	async getStockInfo(symbol: string): Promise<SecurityInfoResult> {
		const sym = normalizeSymbol(symbol)
		return this.uncached('securityInfo', sym, (p) => p.getSecurityInfo?.(sym))
	}

	async getEarnings(symbol: string): Promise<EarningsResult> {
		const sym = normalizeSymbol(symbol)
		return this.uncached('earnings', sym, (p) => p.getNextEarnings?.(sym))
	}

	// ── cache warm-up ──────────────────────────────────────────────

	/**
	 * Loads daily bars and fundamentals for each symbol through the normal
	 * cache-first path, one symbol at a time. Failures are reported per
	 * symbol and capability instead of aborting the run.
	 */
	async warm(symbols: string[], period = '2y'): Promise<WarmOutcome[]> {
		const out: WarmOutcome[] = []
		for (const symbol of symbols) {
			const label = symbol.trim().toUpperCase()
			const jobs = [
				['priceHistory', () => this.getOhlcv(symbol, period)],
				['fundamentals', () => this.getFundamentals(symbol)],
			] as const
			for (const [capability, load] of jobs) {
				try {
					const result = await load()
					out.push({ symbol: label, capability, ok: true, source: result.source })
				} catch (err) {
					const error = err instanceof Error ? err.message : String(err)
					this.log.warn({ symbol: label, capability, err }, 'cache warm-up failed')
					out.push({ symbol: label, capability, ok: false, error })
				}
			}
		}
		return out
	}

	// ── diagnostics ────────────────────────────────────────────────

	status(): OrchestratorStatus {
		const breakers: Record<string, BreakerStatus> = {}
		const limiters: Record<string, LimiterStatus> = {}
		for (const p of this.providers) {
			breakers[p.name] = this.breakers.get(p.name).status()
			limiters[p.name] = this.limiters.get(p.name, p.rateLimits).status()
		}
		return {
			breakers,
			limiters,
			providers: this.providers.map(describeProvider),
			lastSource: Object.fromEntries(this.lastSource),
			cache: this.cache.stats(),
		}
	}

	/** Last source that served `capability` for `symbol`, if any call has succeeded yet. */
	lastSourceFor(symbol: string, capability: Capability): string | undefined {
		return this.lastSource.get(`${normalizeSymbol(symbol)}:${capability}`)
	}

	// ── internals ──────────────────────────────────────────────────

	private async uncached<T extends { source: string }>(
		capability: Capability,
		symbol: string,
		request: (p: Provider) => Promise<T> | undefined,
	): Promise<T> {
		const outcome = await this.walk(capability, symbol, request)
		if (outcome.ok) return outcome.value
		throw new AllSourcesExhaustedError(capability, symbol, outcome.reasons)
	}

	/** Tries each adapter of the chain in order; failures are logged and collected, never thrown. */
	private async walk<T extends { source: string }>(
		capability: Capability,
		symbol: string,
		request: (p: Provider) => Promise<T> | undefined,
	): Promise<ChainOutcome<T>> {
		const reasons: FailureReason[] = []
		for (const provider of this.chain(capability)) {
			try {
				const value = await this.invoke(provider, capability, symbol, request)
				this.served(symbol, capability, value)
				return { ok: true, value, provider }
			} catch (err) {
				reasons.push(this.failure(provider, capability, symbol, err))
			}
		}
		return { ok: false, reasons }
	}

	private invoke<T>(
		provider: Provider,
		capability: Capability,
		symbol: string,
		request: (p: Provider) => Promise<T> | undefined,
	): Promise<T> {
		const pending = request(provider)
		if (!pending) {
			return Promise.reject(
				new ProviderUnavailableError(provider.name, `${capability} not implemented`, symbol),
			)
		}
		return pending
	}

	private failure(provider: Provider, capability: Capability, symbol: string, err: unknown): FailureReason {
		const error = toProviderError(provider.name, err, symbol)
		this.log.warn({ source: provider.name, capability, symbol, kind: error.kind, err: error }, 'source failed')
		return toFailureReason(error)
	}

	/** A failed cache write is logged; the fetched result is still returned. */
	private store(key: string, payload: unknown, options: PutOptions): void {
		try {
			this.cache.put(key, payload, options)
		} catch (err) {
			this.log.warn({ key, err }, 'cache write failed')
		}
	}

	private served<T extends { source: string }>(symbol: string, capability: Capability, result: T): T {
		this.lastSource.set(`${symbol}:${capability}`, result.source)
		return result
	}

	private coversPeriod(entry: CacheEntry, period: string): boolean {
		const cachedPeriod = entry.meta?.period
		if (typeof cachedPeriod !== 'string') return false
		try {
			return periodToDays(cachedPeriod) >= periodToDays(period)
		} catch {
			return false
		}
	}

	private readOhlcv(entry: CacheEntry): OhlcvResult | undefined {
		const parsed = ohlcvPayloadSchema.safeParse(entry.payload)
		if (parsed.success) return parsed.data
		this.log.warn({ key: entry.key }, 'cached price history does not match the current shape')
		return undefined
	}

	private readFundamentals(entry: CacheEntry): FundamentalsResult | undefined {
		const parsed = fundamentalsPayloadSchema.safeParse(entry.payload)
		if (!parsed.success) {
			this.log.warn({ key: entry.key }, 'cached fundamentals do not match the current shape')
			return undefined
		}
		const data = emptyFundamentals()
		const fieldSources: FieldSources = {}
		for (const field of FUNDAMENTALS_FIELDS) {
			data[field] = parsed.data.data[field] ?? null
			const source = parsed.data.fieldSources[field]
			if (source !== undefined) fieldSources[field] = source
		}
		return { ...parsed.data, data, fieldSources }
	}
}

/** Wires config, logging, cache, breakers, limiters and adapters into one orchestrator. */
export function createOrchestrator(options: OrchestratorOptions = {}): DataOrchestrator {
	const config = options.config ?? loadConfig()
	const logger = options.logger ?? createLogger(config.logLevel)
	if (!options.config) {
		const problem = getConfigProblem()
		if (problem) logger.warn({ problem }, 'config file ignored')
	}

	const breakers = new BreakerRegistry(config.breaker, logger)
	const limiters = new LimiterRegistry(config.rateLimits)
	const ctx: ProviderContext = {
		config,
		breakers,
		limiters,
		logger,
		fetch: options.fetch ?? fetch,
	}
	const providers = buildProviders(ctx, options.providers ?? defaultProviderFactories)
	const cache = options.cache ?? new CacheStore(config.cacheDir, logger)

	return new DataOrchestrator(config, cache, providers, breakers, limiters, logger)
}

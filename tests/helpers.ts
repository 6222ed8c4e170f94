import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { BreakerRegistry } from '../src/core/circuit-breaker.js'
import { type AppConfig, defaultConfig } from '../src/core/config.js'
import { silentLogger } from '../src/core/logger.js'
import { LimiterRegistry } from '../src/core/rate-limiter.js'
import { guardedCall } from '../src/providers/base.js'
import type { FetchFn, Provider, ProviderContext, ProviderFactory } from '../src/providers/types.js'
import {
	type Bar,
	type Capability,
	emptyFundamentals,
	type Fundamentals,
	type FundamentalsField,
	type FundamentalsResult,
	FUNDAMENTALS_FIELDS,
	type OhlcvResult,
} from '../src/types.js'

export function tempDir(prefix = 'smd-test-'): string {
	return mkdtempSync(join(tmpdir(), prefix))
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
	return {
		...defaultConfig(),
		cacheDir: tempDir(),
		logLevel: 'silent',
		...overrides,
	}
}

export const unexpectedFetch: FetchFn = async (input) => {
	throw new Error(`unexpected fetch: ${String(input)}`)
}

export function testContext(config: AppConfig = testConfig(), fetchFn: FetchFn = unexpectedFetch): ProviderContext {
	return {
		config,
		breakers: new BreakerRegistry(config.breaker, silentLogger),
		limiters: new LimiterRegistry(config.rateLimits),
		logger: silentLogger,
		fetch: fetchFn,
	}
}

export function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { 'content-type': 'application/json' },
	})
}

/** Fetch stub that records every requested URL and answers through `handler`. */
export function stubFetch(handler: (url: URL) => Response) {
	const calls: URL[] = []
	const fetch: FetchFn = async (input) => {
		const url = new URL(String(input))
		calls.push(url)
		return handler(url)
	}
	return { fetch, calls }
}

/** `n` consecutive calendar days of bars starting at `start` (YYYY-MM-DD). */
export function makeBars(n: number, start = '2024-01-01'): Bar[] {
	const t0 = Date.parse(`${start}T00:00:00Z`)
	return Array.from({ length: n }, (_, i) => ({
		timestamp: new Date(t0 + i * 86_400_000).toISOString().slice(0, 10),
		open: 100 + i,
		high: 101 + i,
		low: 99 + i,
		close: 100.5 + i,
		volume: 1000 + i,
	}))
}

export function ohlcvResult(source: string, n: number, period = '2y', symbol = 'AAPL'): OhlcvResult {
	const bars = makeBars(n)
	return { symbol, period, source, bars, rows: bars.length, fetchedAt: '2024-06-03T12:00:00.000Z' }
}

export function fundamentalsResult(source: string, values: Partial<Fundamentals>, symbol = 'AAPL'): FundamentalsResult {
	const data = { ...emptyFundamentals(), ...values }
	const fieldSources: Partial<Record<FundamentalsField, string>> = {}
	for (const field of FUNDAMENTALS_FIELDS) {
		if (data[field] !== null) fieldSources[field] = source
	}
	return { symbol, source, data, fieldSources, fetchedAt: '2024-06-03T12:00:00.000Z' }
}

type Handlers = Partial<
	Pick<
		Provider,
		| 'getPriceHistory'
		| 'getIntraday'
		| 'getFundamentals'
		| 'getFundamentalsFields'
		| 'getQuote'
		| 'getSecurityInfo'
		| 'getNextEarnings'
	>
>

export interface MockSourceOptions {
	capabilities: Capability[]
	priority?: Partial<Record<Capability, number>>
	knownGaps?: FundamentalsField[]
	handlers: Handlers
}

/**
 * Factory for an in-memory adapter. Every handler runs under the same guarded
 * call as the real adapters, so breaker and limiter accounting is exercised.
 */
export function mockSource(name: string, options: MockSourceOptions): ProviderFactory {
	return (ctx) => {
		const rateLimits = { perMinute: 1000 }
		const guard =
			<A extends [string, ...unknown[]], R>(fn: ((...args: A) => Promise<R>) | undefined) =>
			(fn === undefined
				? undefined
				: (...args: A) => guardedCall(ctx, { source: name, symbol: args[0], rateLimits }, () => fn(...args)))
		const { handlers } = options
		return {
			name,
			requiresKey: false,
			capabilities: options.capabilities,
			priority: options.priority ?? {},
			rateLimits,
			knownGaps: options.knownGaps,
			isEnabled: () => true,
			getPriceHistory: guard(handlers.getPriceHistory),
			getIntraday: guard(handlers.getIntraday),
			getFundamentals: guard(handlers.getFundamentals),
			getFundamentalsFields: guard(handlers.getFundamentalsFields),
			getQuote: guard(handlers.getQuote),
			getSecurityInfo: guard(handlers.getSecurityInfo),
			getNextEarnings: guard(handlers.getNextEarnings),
		}
	}
}

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
	AuthenticationError,
	DataNotFoundError,
	InsufficientDataError,
	ProviderUnavailableError,
	RateLimitError,
} from '../src/core/errors.js'
import { guardedCall } from '../src/providers/base.js'
import { finnhub } from '../src/providers/finnhub.js'
import { fmp } from '../src/providers/fmp.js'
import { parseStooqCsv, stooq, stooqSymbol } from '../src/providers/stooq.js'
import { twelvedata } from '../src/providers/twelvedata.js'
import type { ProviderContext } from '../src/providers/types.js'
import { type YahooClient, yahoo } from '../src/providers/yahoo-finance.js'
import { jsonResponse, makeBars, stubFetch, testConfig, testContext } from './helpers.js'

const KEYS = { twelvedataApiKey: 'test-secret', finnhubApiKey: 'test-secret', fmpApiKey: 'test-secret' }

function keyedContext(handler: (url: URL) => Response) {
	const stub = stubFetch(handler)
	return { ctx: testContext(testConfig(KEYS), stub.fetch), calls: stub.calls }
}

function failures(ctx: ProviderContext, source: string): number {
	return ctx.breakers.get(source).status().consecutiveFailures
}

beforeEach(() => {
	vi.useFakeTimers({ toFake: ['Date'] })
	vi.setSystemTime(new Date('2024-06-03T12:00:00Z'))
})

afterEach(() => {
	vi.useRealTimers()
})

// ─── Shared call contract ────────────────────────────────────────────────────

describe('guardedCall', () => {
	const spec = { source: 'alpha', symbol: 'AAPL', rateLimits: { perMinute: 1 } }

	it('refuses without calling when the breaker is open', async () => {
		const ctx = testContext()
		for (let i = 0; i < 3; i++) ctx.breakers.get('alpha').recordFailure()
		const call = vi.fn(async () => 1)
		await expect(guardedCall(ctx, spec, call)).rejects.toThrow('[alpha] Circuit breaker OPEN (symbol=AAPL)')
		expect(call).not.toHaveBeenCalled()
	})

	it('refuses without calling when the bucket is empty', async () => {
		const ctx = testContext()
		await guardedCall(ctx, spec, async () => 1)
		const call = vi.fn(async () => 2)
		await expect(guardedCall(ctx, spec, call)).rejects.toBeInstanceOf(RateLimitError)
		expect(call).not.toHaveBeenCalled()
	})

	it('marks its own refusals as local so they never count against the breaker', async () => {
		const ctx = testContext()
		await guardedCall(ctx, spec, async () => 1)
		const err = await guardedCall(ctx, spec, async () => 2).catch((e: unknown) => e)
		expect(err).toBeInstanceOf(RateLimitError)
		expect(err instanceof RateLimitError && err.local && !err.countsAsFailure).toBe(true)
		expect(failures(ctx, 'alpha')).toBe(0)
		expect(new RateLimitError('alpha', 'HTTP 429').countsAsFailure).toBe(true)
	})

	it('wraps unknown errors as unavailable and counts them', async () => {
		const ctx = testContext()
		const err = await guardedCall(ctx, spec, async () => {
			throw new Error('socket hang up')
		}).catch((e: unknown) => e)
		expect(err).toBeInstanceOf(ProviderUnavailableError)
		expect(failures(ctx, 'alpha')).toBe(1)
	})

	it('does not count a missing symbol against the breaker', async () => {
		const ctx = testContext()
		await expect(
			guardedCall(ctx, spec, async () => {
				throw new DataNotFoundError('alpha', 'unknown ticker', 'AAPL')
			}),
		).rejects.toBeInstanceOf(DataNotFoundError)
		expect(failures(ctx, 'alpha')).toBe(0)
	})
})

// ─── TwelveData ──────────────────────────────────────────────────────────────

function series(n: number) {
	return {
		status: 'ok',
		values: makeBars(n)
			.reverse()
			.map((b) => ({
				datetime: b.timestamp,
				open: String(b.open),
				high: String(b.high),
				low: String(b.low),
				close: String(b.close),
				volume: String(b.volume),
			})),
	}
}

describe('twelvedata', () => {
	it('fetches daily bars sized to the period', async () => {
		const { ctx, calls } = keyedContext(() => jsonResponse(series(25)))
		const result = await twelvedata(ctx).getPriceHistory?.('AAPL', '1mo')
		expect(result?.bars).toEqual(makeBars(25))
		expect(result).toMatchObject({ symbol: 'AAPL', period: '1mo', source: 'twelvedata', rows: 25 })
		expect(calls[0].pathname).toBe('/time_series')
		expect(calls[0].searchParams.get('interval')).toBe('1day')
		expect(calls[0].searchParams.get('outputsize')).toBe('21')
		expect(calls[0].searchParams.get('apikey')).toBe('test-secret')
	})

	it('maps an embedded 429 to a rate-limit failure', async () => {
		const { ctx } = keyedContext(() => jsonResponse({ status: 'error', code: 429, message: 'out of credits' }))
		await expect(twelvedata(ctx).getPriceHistory?.('AAPL', '1y')).rejects.toBeInstanceOf(RateLimitError)
		expect(failures(ctx, 'twelvedata')).toBe(1)
	})

	it('maps an unknown symbol to not-found without charging the breaker', async () => {
		const { ctx } = keyedContext(() =>
			jsonResponse({ status: 'error', code: 400, message: '**symbol** not found: NOPE' }),
		)
		await expect(twelvedata(ctx).getPriceHistory?.('NOPE', '1y')).rejects.toBeInstanceOf(DataNotFoundError)
		expect(failures(ctx, 'twelvedata')).toBe(0)
	})

	it('fails on a missing key before any request', async () => {
		const stub = stubFetch(() => jsonResponse(series(25)))
		const ctx = testContext(testConfig(), stub.fetch)
		await expect(twelvedata(ctx).getPriceHistory?.('AAPL', '1y')).rejects.toBeInstanceOf(AuthenticationError)
		expect(stub.calls).toHaveLength(0)
		expect(failures(ctx, 'twelvedata')).toBe(0)
	})

	it('rejects too short a history', async () => {
		const { ctx } = keyedContext(() => jsonResponse(series(5)))
		await expect(twelvedata(ctx).getPriceHistory?.('AAPL', '1y')).rejects.toBeInstanceOf(InsufficientDataError)
	})

	it('requests intraday bars in UTC and returns ISO timestamps', async () => {
		const { ctx, calls } = keyedContext(() =>
			jsonResponse({
				values: [{ datetime: '2024-03-01 14:30:00', open: '1', high: '2', low: '0.5', close: '1.5', volume: '10' }],
			}),
		)
		const result = await twelvedata(ctx).getIntraday?.('AAPL', '5m', '5d')
		expect(result?.bars[0].timestamp).toBe('2024-03-01T14:30:00.000Z')
		expect(calls[0].searchParams.get('interval')).toBe('5min')
		expect(calls[0].searchParams.get('outputsize')).toBe('234')
		expect(calls[0].searchParams.get('timezone')).toBe('UTC')
	})
})

// ─── Finnhub ─────────────────────────────────────────────────────────────────

describe('finnhub', () => {
	it('normalizes fundamentals to canonical units', async () => {
		const { ctx, calls } = keyedContext(() =>
			jsonResponse({
				metric: {
					peTTM: 30,
					marketCapitalization: 2_500_000,
					netProfitMarginTTM: 25,
					dividendYieldIndicatedAnnual: 0.5,
				},
			}),
		)
		const result = await finnhub(ctx).getFundamentals?.('AAPL')
		expect(result?.data).toMatchObject({ pe: 30, marketCap: 2.5e12, profitMargin: 0.25, dividendYield: 0.005 })
		expect(result?.data.epsGrowth).toBeNull()
		expect(calls[0].pathname).toBe('/api/v1/stock/metric')
		expect(calls[0].searchParams.get('metric')).toBe('all')
		expect(calls[0].searchParams.get('token')).toBe('test-secret')
	})

	it('treats an empty metric block as not found', async () => {
		const { ctx } = keyedContext(() => jsonResponse({ metric: {} }))
		await expect(finnhub(ctx).getFundamentals?.('NOPE')).rejects.toBeInstanceOf(DataNotFoundError)
	})

	it('rounds quotes and strips the index caret', async () => {
		const { ctx, calls } = keyedContext(() => jsonResponse({ c: 187.456, pc: 185.1 }))
		const quote = await finnhub(ctx).getQuote?.('^VIX')
		expect(quote).toMatchObject({ symbol: '^VIX', price: 187.46, previousClose: 185.1, source: 'finnhub' })
		expect(calls[0].searchParams.get('symbol')).toBe('VIX')
	})

	it('keeps a previous close of zero', async () => {
		const { ctx } = keyedContext(() => jsonResponse({ c: 0.42, pc: 0 }))
		const quote = await finnhub(ctx).getQuote?.('PENNY')
		expect(quote).toMatchObject({ price: 0.42, previousClose: 0 })
	})

	it('treats an all-zero quote as not found', async () => {
		const { ctx } = keyedContext(() => jsonResponse({ c: 0, pc: 0 }))
		await expect(finnhub(ctx).getQuote?.('NOPE')).rejects.toBeInstanceOf(DataNotFoundError)
	})

	it('maps HTTP statuses onto the error taxonomy', async () => {
		const denied = keyedContext(() => jsonResponse({ error: 'denied' }, 401))
		await expect(finnhub(denied.ctx).getQuote?.('AAPL')).rejects.toBeInstanceOf(AuthenticationError)

		const broken = keyedContext(() => jsonResponse({ error: 'boom' }, 500))
		await expect(finnhub(broken.ctx).getQuote?.('AAPL')).rejects.toBeInstanceOf(ProviderUnavailableError)
		expect(failures(broken.ctx, 'finnhub')).toBe(1)
	})

	it('picks the nearest upcoming earnings date', async () => {
		const { ctx, calls } = keyedContext(() =>
			jsonResponse({
				earningsCalendar: [{ date: '2024-08-01' }, { date: '2024-07-25' }, { date: '2024-05-02' }],
			}),
		)
		const earnings = await finnhub(ctx).getNextEarnings?.('AAPL')
		expect(earnings).toMatchObject({ earningsDate: '2024-07-25', method: 'calendar', source: 'finnhub' })
		expect(calls[0].searchParams.get('from')).toBe('2024-06-03')
		expect(calls[0].searchParams.get('to')).toBe('2024-10-01')
	})

	it('reads the company profile', async () => {
		const { ctx } = keyedContext(() => jsonResponse({ name: 'Test Corp', finnhubIndustry: 'Technology' }))
		const info = await finnhub(ctx).getSecurityInfo?.('TEST')
		expect(info?.data).toEqual({
			name: 'Test Corp',
			sector: 'Technology',
			industry: null,
			fiftyTwoWeekHigh: null,
			fiftyTwoWeekLow: null,
			avgVolume: null,
			avgVolume10d: null,
		})
	})
})

// ─── FMP ─────────────────────────────────────────────────────────────────────

function fmpHandler(keyMetrics: unknown) {
	return (url: URL): Response => {
		if (url.pathname.startsWith('/api/v3/key-metrics-ttm/')) return jsonResponse(keyMetrics)
		if (url.pathname.startsWith('/api/v3/financial-growth/')) {
			return jsonResponse([{ epsgrowth: 0.12, revenueGrowth: 0.08 }])
		}
		return jsonResponse({}, 404)
	}
}

describe('fmp', () => {
	it('combines key metrics and growth at two tokens', async () => {
		const { ctx, calls } = keyedContext(fmpHandler([{ peRatioTTM: 30, roeTTM: 0.45 }]))
		const result = await fmp(ctx).getFundamentals?.('AAPL')
		expect(result?.data).toMatchObject({ pe: 30, roe: 45, epsGrowth: 12, revenueGrowth: 8 })
		expect(calls.map((u) => u.pathname)).toEqual([
			'/api/v3/key-metrics-ttm/AAPL',
			'/api/v3/financial-growth/AAPL',
		])
		expect(ctx.limiters.status().fmp.dailyUsed).toBe(2)
	})

	it('treats an empty key-metrics array as not found', async () => {
		const { ctx, calls } = keyedContext(fmpHandler([]))
		await expect(fmp(ctx).getFundamentals?.('NOPE')).rejects.toBeInstanceOf(DataNotFoundError)
		expect(calls).toHaveLength(1)
	})

	it('answers a narrow field request with one call', async () => {
		const { ctx, calls } = keyedContext(fmpHandler([]))
		const result = await fmp(ctx).getFundamentalsFields?.('AAPL', ['epsGrowth'])
		expect(result?.data.epsGrowth).toBe(12)
		expect(result?.data.revenueGrowth).toBeNull()
		expect(result?.fieldSources).toEqual({ epsGrowth: 'fmp' })
		expect(calls).toHaveLength(1)
	})
})

// ─── Stooq ───────────────────────────────────────────────────────────────────

function stooqCsv(n: number): string {
	const rows = makeBars(n).map((b) => [b.timestamp, b.open, b.high, b.low, b.close, b.volume].join(','))
	return ['Date,Open,High,Low,Close,Volume', ...rows].join('\r\n')
}

describe('stooq', () => {
	it('maps symbols to its market suffixes', () => {
		expect(stooqSymbol('AAPL')).toBe('aapl.us')
		expect(stooqSymbol('BRK.B')).toBe('brk.b')
		expect(stooqSymbol('^SPX')).toBe('^spx')
	})

	it('parses the CSV download', () => {
		expect(parseStooqCsv(stooqCsv(3), 'AAPL')).toEqual(makeBars(3))
	})

	it('reads "No data" as not found and a changed header as unavailable', () => {
		expect(() => parseStooqCsv('No data', 'NOPE')).toThrow(DataNotFoundError)
		expect(() => parseStooqCsv('Date,Open,Close\n2024-01-01,1,2', 'AAPL')).toThrow(ProviderUnavailableError)
	})

	it('requests the period window for the mapped symbol', async () => {
		const stub = stubFetch(() => new Response(stooqCsv(12)))
		const ctx = testContext(testConfig(), stub.fetch)
		const result = await stooq(ctx).getPriceHistory?.('AAPL', '1mo')
		expect(result).toMatchObject({ source: 'stooq', rows: 12 })
		const params = stub.calls[0].searchParams
		expect(params.get('s')).toBe('aapl.us')
		expect(params.get('d1')).toBe('20240504')
		expect(params.get('d2')).toBe('20240603')
		expect(params.get('i')).toBe('d')
	})
})

// ─── Yahoo ───────────────────────────────────────────────────────────────────

function fakeYahoo(overrides: Partial<YahooClient>): YahooClient {
	const unexpected = async (): Promise<never> => {
		throw new Error('unexpected yahoo call')
	}
	return { chart: unexpected, quote: unexpected, quoteSummary: unexpected, ...overrides }
}

describe('yahoo', () => {
	it('converts chart quotes to daily bars', async () => {
		const chart = vi.fn(async () => ({
			quotes: makeBars(12).map((b) => ({ ...b, date: new Date(`${b.timestamp}T14:30:00Z`) })),
		}))
		const result = await yahoo(testContext(), fakeYahoo({ chart })).getPriceHistory?.('AAPL', '1mo')
		expect(result?.bars).toEqual(makeBars(12))
		expect(chart).toHaveBeenCalledWith('AAPL', { period1: new Date('2024-05-04T12:00:00Z'), interval: '1d' })
	})

	it('classifies library errors by message', async () => {
		const ctx = testContext()
		const client = fakeYahoo({
			chart: async () => {
				throw new Error('Quote not found for ticker symbol: NOPE')
			},
		})
		await expect(yahoo(ctx, client).getPriceHistory?.('NOPE', '1y')).rejects.toBeInstanceOf(DataNotFoundError)
		expect(failures(ctx, 'yahoo')).toBe(0)
	})

	it('flattens summary modules into fundamentals and derives PEG', async () => {
		const client = fakeYahoo({
			quoteSummary: async () => ({
				price: {},
				summaryDetail: { trailingPE: 28, dividendYield: 0.0055, beta: 1.2 },
				defaultKeyStatistics: {},
				financialData: { returnOnEquity: 1.5, earningsGrowth: 0.1 },
			}),
		})
		const result = await yahoo(testContext(), client).getFundamentals?.('AAPL')
		expect(result?.data).toMatchObject({
			pe: 28,
			roe: 150,
			epsGrowth: 10,
			pegRatio: 2.8,
			dividendYield: 0.0055,
			beta: 1.2,
		})
		expect(result?.fieldSources.pegRatio).toBe('yahoo')
	})

	it('rounds the quote price', async () => {
		const client = fakeYahoo({
			quote: async () => ({ regularMarketPrice: 150.123, regularMarketPreviousClose: 149 }),
		})
		const quote = await yahoo(testContext(), client).getQuote?.('AAPL')
		expect(quote).toMatchObject({ price: 150.12, previousClose: 149, source: 'yahoo' })
	})

	it('keeps a previous close of zero and nulls a missing one', async () => {
		const zero = fakeYahoo({ quote: async () => ({ regularMarketPrice: 0.42, regularMarketPreviousClose: 0 }) })
		const missing = fakeYahoo({ quote: async () => ({ regularMarketPrice: 0.42 }) })
		expect(await yahoo(testContext(), zero).getQuote?.('PENNY')).toMatchObject({ previousClose: 0 })
		expect(await yahoo(testContext(), missing).getQuote?.('PENNY')).toMatchObject({ previousClose: null })
	})

	it('reads security info, preferring the long name', async () => {
		const client = fakeYahoo({
			quoteSummary: async () => ({
				price: { shortName: 'Test Corp' },
				summaryProfile: { sector: 'Technology', industry: 'Software' },
				summaryDetail: {
					fiftyTwoWeekHigh: 200,
					fiftyTwoWeekLow: 100,
					averageVolume: 1_000_000,
					averageDailyVolume10Day: 900_000,
				},
			}),
		})
		const info = await yahoo(testContext(), client).getSecurityInfo?.('TEST')
		expect(info?.data).toEqual({
			name: 'Test Corp',
			sector: 'Technology',
			industry: 'Software',
			fiftyTwoWeekHigh: 200,
			fiftyTwoWeekLow: 100,
			avgVolume: 1_000_000,
			avgVolume10d: 900_000,
		})
	})

	it('takes earnings from the calendar module', async () => {
		const client = fakeYahoo({
			quoteSummary: async () => ({
				calendarEvents: { earnings: { earningsDate: [new Date('2024-07-25T20:00:00Z')] } },
			}),
		})
		const earnings = await yahoo(testContext(), client).getNextEarnings?.('AAPL')
		expect(earnings).toMatchObject({ earningsDate: '2024-07-25', method: 'calendar' })
	})

	it('falls back to the quote earnings timestamp at the cost of a second token', async () => {
		const ctx = testContext()
		const client = fakeYahoo({
			quoteSummary: async () => ({ calendarEvents: { earnings: { earningsDate: [] } } }),
			quote: async () => ({ regularMarketPrice: 1, earningsTimestamp: new Date('2024-07-30T12:00:00Z') }),
		})
		const earnings = await yahoo(ctx, client).getNextEarnings?.('AAPL')
		expect(earnings).toMatchObject({ earningsDate: '2024-07-30', method: 'quote' })
		expect(ctx.limiters.status().yahoo.dailyUsed).toBe(2)
	})

	it('leaves the breaker closed when its own limiter refuses the follow-up call', async () => {
		const ctx = testContext(testConfig({ rateLimits: { yahoo: { perMinute: 1 } } }))
		const quote = vi.fn(async () => ({ regularMarketPrice: 150, regularMarketPreviousClose: 149 }))
		const client = fakeYahoo({
			quoteSummary: async () => ({ calendarEvents: { earnings: { earningsDate: [] } } }),
			quote,
		})
		const source = yahoo(ctx, client)

		for (let i = 0; i < 3; i++) {
			const err = await source.getNextEarnings?.('AAPL').catch((e: unknown) => e)
			expect(err).toBeInstanceOf(RateLimitError)
			expect(err instanceof RateLimitError && err.countsAsFailure).toBe(false)
			vi.setSystemTime(Date.now() + 61_000)
		}

		expect(ctx.breakers.get('yahoo').status()).toMatchObject({ state: 'CLOSED', consecutiveFailures: 0 })
		expect(quote).not.toHaveBeenCalled()
		expect(await source.getQuote?.('AAPL')).toMatchObject({ price: 150, source: 'yahoo' })
	})

	it('reports no date when every hint is in the past', async () => {
		const client = fakeYahoo({
			quoteSummary: async () => ({ calendarEvents: { earnings: { earningsDate: ['2024-05-02'] } } }),
			quote: async () => ({ earningsTimestamp: 1_714_680_000 }),
		})
		const earnings = await yahoo(testContext(), client).getNextEarnings?.('AAPL')
		expect(earnings).toMatchObject({ earningsDate: null, method: null })
	})
})

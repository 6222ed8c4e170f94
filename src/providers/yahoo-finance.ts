import YahooFinance from 'yahoo-finance2'
import { z } from 'zod'
import { MIN_DAILY_BARS, normalizeBars, periodToDays, toDateString } from '../core/bars.js'
import {
	DataNotFoundError,
	InsufficientDataError,
	ProviderError,
	ProviderUnavailableError,
	RateLimitError,
} from '../core/errors.js'
import type {
	Bar,
	EarningsResult,
	FundamentalsResult,
	OhlcvResult,
	QuoteResult,
	SecurityInfoResult,
} from '../types.js'
import { acquireAdditionalToken, type CallSpec, guardedCall, nowIso, parsePayload } from './base.js'
import { applyFieldMap, countFilled, securityInfoFrom, sourcesFor, YAHOO_FUNDAMENTALS } from './field-maps.js'
import type { IntradayInterval, Provider, ProviderContext, RateLimitConfig } from './types.js'

const SOURCE = 'yahoo'

const rateLimits: RateLimitConfig = { perMinute: 30 }

export type YahooChartInterval = '1d' | IntradayInterval

export type YahooSummaryModule =
	| 'price'
	| 'summaryProfile'
	| 'summaryDetail'
	| 'defaultKeyStatistics'
	| 'financialData'
	| 'calendarEvents'

/**
 * The slice of yahoo-finance2 this adapter calls. Results are validated here
 * rather than trusted, so the client only has to promise `unknown`.
 */
export interface YahooClient {
	chart(symbol: string, options: { period1: Date; interval: YahooChartInterval }): Promise<unknown>
	quote(symbol: string): Promise<unknown>
	quoteSummary(symbol: string, modules: YahooSummaryModule[]): Promise<unknown>
}

export function createYahooClient(): YahooClient {
	const yf = new YahooFinance({ suppressNotices: ['yahooSurvey'] })
	return {
		chart: (symbol, options) => yf.chart(symbol, options),
		quote: (symbol) => yf.quote(symbol),
		quoteSummary: (symbol, modules) => yf.quoteSummary(symbol, { modules }),
	}
}

const dateLike = z.union([z.date(), z.string(), z.number()])

const chartSchema = z.object({
	quotes: z
		.array(
			z.object({
				date: dateLike,
				open: z.number().nullish(),
				high: z.number().nullish(),
				low: z.number().nullish(),
				close: z.number().nullish(),
				volume: z.number().nullish(),
			}),
		)
		.default([]),
})

const quoteSchema = z
	.object({
		regularMarketPrice: z.number().nullish(),
		regularMarketPreviousClose: z.number().nullish(),
		earningsTimestamp: dateLike.nullish(),
	})
	.passthrough()
	.nullish()

const moduleSchema = z.record(z.string(), z.unknown()).nullish()

const summarySchema = z.object({
	price: moduleSchema,
	summaryProfile: moduleSchema,
	summaryDetail: moduleSchema,
	defaultKeyStatistics: moduleSchema,
	financialData: moduleSchema,
	calendarEvents: z
		.object({
			earnings: z.object({ earningsDate: z.array(dateLike).default([]) }).partial().nullish(),
		})
		.passthrough()
		.nullish(),
})

type Summary = z.infer<typeof summarySchema>

function toDate(v: z.infer<typeof dateLike>): Date {
	if (v instanceof Date) return v
	// Epoch seconds from the raw API, milliseconds from the library
	if (typeof v === 'number') return new Date(v < 1e12 ? v * 1000 : v)
	return new Date(v)
}

/** Merges the summary modules into one record keyed by Yahoo's field names. */
export function flattenSummary(summary: Summary): Record<string, unknown> {
	return {
		...summary.price,
		...summary.summaryProfile,
		...summary.summaryDetail,
		...summary.defaultKeyStatistics,
		...summary.financialData,
	}
}

/** yahoo-finance2 throws plain errors; sort them by message. */
export function classifyYahooError(err: unknown, symbol: string): unknown {
	if (err instanceof ProviderError || !(err instanceof Error)) return err
	const message = err.message
	if (/too many requests|\b429\b/i.test(message)) {
		return new RateLimitError(SOURCE, message, symbol, { cause: err })
	}
	if (/not found|no data|delisted|invalid symbol/i.test(message)) {
		return new DataNotFoundError(SOURCE, message, symbol, { cause: err })
	}
	return new ProviderUnavailableError(SOURCE, message, symbol, { cause: err })
}

function round2(v: number): number {
	return Math.round(v * 100) / 100
}

export function yahoo(ctx: ProviderContext, client?: YahooClient): Provider {
	let yf = client
	const getClient = (): YahooClient => {
		yf ??= createYahooClient()
		return yf
	}

	const spec = (symbol: string): CallSpec => ({ source: SOURCE, symbol, rateLimits })

	async function call<T>(symbol: string, fn: (c: YahooClient) => Promise<T>): Promise<T> {
		try {
			return await fn(getClient())
		} catch (err) {
			throw classifyYahooError(err, symbol)
		}
	}

	async function fetchBars(symbol: string, period: string, interval: YahooChartInterval): Promise<Bar[]> {
		const period1 = new Date(Date.now() - periodToDays(period) * 86_400_000)
		const raw = await call(symbol, (c) => c.chart(symbol, { period1, interval }))
		const chart = parsePayload(chartSchema, raw, SOURCE, symbol)
		const intraday = interval !== '1d'
		const bars = normalizeBars(
			chart.quotes.map((q) => {
				const date = toDate(q.date)
				return {
					timestamp: intraday ? date.toISOString() : toDateString(date),
					open: q.open ?? Number.NaN,
					high: q.high ?? Number.NaN,
					low: q.low ?? Number.NaN,
					close: q.close ?? Number.NaN,
					volume: q.volume ?? 0,
				}
			}),
		)
		if (bars.length === 0) throw new DataNotFoundError(SOURCE, 'No bars returned', symbol)
		return bars
	}

	async function fetchSummary(symbol: string, modules: YahooSummaryModule[]): Promise<Summary> {
		const raw = await call(symbol, (c) => c.quoteSummary(symbol, modules))
		return parsePayload(summarySchema, raw, SOURCE, symbol)
	}

	return {
		name: SOURCE,
		requiresKey: false,
		capabilities: ['priceHistory', 'intraday', 'fundamentals', 'quote', 'securityInfo', 'earnings'],
		priority: { priceHistory: 2, intraday: 2, fundamentals: 3, quote: 1, securityInfo: 1, earnings: 1 },
		rateLimits,

		isEnabled(): boolean {
			return true
		},

		getPriceHistory(symbol: string, period: string): Promise<OhlcvResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const bars = await fetchBars(symbol, period, '1d')
				if (bars.length < MIN_DAILY_BARS) {
					throw new InsufficientDataError(SOURCE, `Only ${bars.length} bars`, symbol)
				}
				return { symbol, period, source: SOURCE, bars, rows: bars.length, fetchedAt: nowIso() }
			})
		},

		getIntraday(symbol: string, interval: IntradayInterval, period: string): Promise<OhlcvResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const bars = await fetchBars(symbol, period, interval)
				return { symbol, period, source: SOURCE, bars, rows: bars.length, fetchedAt: nowIso() }
			})
		},

		getFundamentals(symbol: string): Promise<FundamentalsResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const summary = await fetchSummary(symbol, [
					'price',
					'summaryDetail',
					'defaultKeyStatistics',
					'financialData',
				])
				const data = applyFieldMap(flattenSummary(summary), YAHOO_FUNDAMENTALS)
				if (countFilled(data) === 0) throw new DataNotFoundError(SOURCE, 'No usable metrics', symbol)
				// PEG from trailing P/E over EPS growth (percent) when Yahoo omits it
				if (data.pegRatio === null && data.pe !== null && data.epsGrowth !== null && data.epsGrowth > 0) {
					data.pegRatio = round2(data.pe / data.epsGrowth)
				}
				return { symbol, source: SOURCE, data, fieldSources: sourcesFor(data, SOURCE), fetchedAt: nowIso() }
			})
		},

		getQuote(symbol: string): Promise<QuoteResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const q = parsePayload(quoteSchema, await call(symbol, (c) => c.quote(symbol)), SOURCE, symbol)
				if (!q || q.regularMarketPrice == null) {
					throw new DataNotFoundError(SOURCE, 'No price in quote', symbol)
				}
				return {
					symbol,
					price: round2(q.regularMarketPrice),
					previousClose: q.regularMarketPreviousClose != null ? round2(q.regularMarketPreviousClose) : null,
					source: SOURCE,
					fetchedAt: nowIso(),
				}
			})
		},

		getSecurityInfo(symbol: string): Promise<SecurityInfoResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const summary = await fetchSummary(symbol, [
					'price',
					'summaryProfile',
					'summaryDetail',
				])
				const flat = flattenSummary(summary)
				if (Object.keys(flat).length === 0) {
					throw new DataNotFoundError(SOURCE, 'No security info returned', symbol)
				}
				const data = securityInfoFrom(flat, {
					name: typeof flat.longName === 'string' ? 'longName' : 'shortName',
					sector: 'sector',
					industry: 'industry',
					fiftyTwoWeekHigh: 'fiftyTwoWeekHigh',
					fiftyTwoWeekLow: 'fiftyTwoWeekLow',
					avgVolume: 'averageVolume',
					avgVolume10d: 'averageDailyVolume10Day',
				})
				return { symbol, source: SOURCE, data, fetchedAt: nowIso() }
			})
		},

		/**
		 * Next earnings date from the calendar module, falling back to the
		 * quote's earnings timestamp (a second call).
		 */
		getNextEarnings(symbol: string): Promise<EarningsResult> {
			const callSpec = spec(symbol)
			return guardedCall(ctx, callSpec, async () => {
				const today = toDateString(new Date())
				const summary = await fetchSummary(symbol, ['calendarEvents'])
				const upcoming = (summary.calendarEvents?.earnings?.earningsDate ?? [])
					.map((d) => toDateString(toDate(d)))
					.filter((d) => d >= today)
					.sort()
				if (upcoming.length > 0) {
					return { symbol, source: SOURCE, earningsDate: upcoming[0], method: 'calendar', fetchedAt: nowIso() }
				}

				acquireAdditionalToken(ctx, callSpec)
				const q = parsePayload(quoteSchema, await call(symbol, (c) => c.quote(symbol)), SOURCE, symbol)
				const ts = q?.earningsTimestamp
				const fromQuote = ts == null ? null : toDateString(toDate(ts))
				if (fromQuote !== null && fromQuote >= today) {
					return { symbol, source: SOURCE, earningsDate: fromQuote, method: 'quote', fetchedAt: nowIso() }
				}
				return { symbol, source: SOURCE, earningsDate: null, method: null, fetchedAt: nowIso() }
			})
		},
	}
}

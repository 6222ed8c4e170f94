import { z } from 'zod'
import { toDateString } from '../core/bars.js'
import { DataNotFoundError } from '../core/errors.js'
import type { EarningsResult, FundamentalsResult, QuoteResult, SecurityInfoResult } from '../types.js'
import { type CallSpec, fetchJson, guardedCall, nowIso, parsePayload } from './base.js'
import {
	applyFieldMap,
	countFilled,
	FINNHUB_FUNDAMENTALS,
	FINNHUB_KNOWN_GAPS,
	securityInfoFrom,
	sourcesFor,
} from './field-maps.js'
import type { Provider, ProviderContext, RateLimitConfig } from './types.js'

const SOURCE = 'finnhub'
const BASE_URL = 'https://finnhub.io/api/v1'

const rateLimits: RateLimitConfig = { perMinute: 60 }

const metricSchema = z.object({
	metric: z.record(z.string(), z.unknown()).nullish(),
})

const quoteSchema = z.object({
	c: z.number().nullish(),
	pc: z.number().nullish(),
	h: z.number().nullish(),
	l: z.number().nullish(),
	o: z.number().nullish(),
})

const profileSchema = z.record(z.string(), z.unknown())

const earningsCalendarSchema = z.object({
	earningsCalendar: z
		.array(z.object({ date: z.string(), symbol: z.string().optional() }))
		.nullish(),
})

/** Finnhub takes `VIX` where other sources take `^VIX`. */
function quoteSymbol(symbol: string): string {
	return symbol.replace(/^\^/, '')
}

function round2(v: number): number {
	return Math.round(v * 100) / 100
}

export function finnhub(ctx: ProviderContext): Provider {
	const apiKey = (): string | undefined => ctx.config.finnhubApiKey

	const spec = (symbol: string): CallSpec => ({
		source: SOURCE,
		symbol,
		rateLimits,
		credential: { value: apiKey(), envVar: 'FINNHUB_API_KEY' },
	})

	async function request(path: string, params: Record<string, string>, symbol: string): Promise<unknown> {
		const url = new URL(`${BASE_URL}${path}`)
		for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value)
		url.searchParams.set('token', apiKey() ?? '')
		return fetchJson(ctx, SOURCE, url, symbol)
	}

	return {
		name: SOURCE,
		requiresKey: true,
		keyEnvVar: 'FINNHUB_API_KEY',
		capabilities: ['fundamentals', 'quote', 'securityInfo', 'earnings'],
		priority: { fundamentals: 1, quote: 2, securityInfo: 2, earnings: 2 },
		rateLimits,
		knownGaps: FINNHUB_KNOWN_GAPS,

		isEnabled(): boolean {
			return !!apiKey()
		},

		getFundamentals(symbol: string): Promise<FundamentalsResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const body = parsePayload(
					metricSchema,
					await request('/stock/metric', { symbol, metric: 'all' }, symbol),
					SOURCE,
					symbol,
				)
				const metric = body.metric ?? {}
				if (Object.keys(metric).length === 0) {
					throw new DataNotFoundError(SOURCE, 'Empty metric data', symbol)
				}
				const data = applyFieldMap(metric, FINNHUB_FUNDAMENTALS)
				if (countFilled(data) === 0) {
					throw new DataNotFoundError(SOURCE, 'No usable metrics', symbol)
				}
				return { symbol, source: SOURCE, data, fieldSources: sourcesFor(data, SOURCE), fetchedAt: nowIso() }
			})
		},

		getQuote(symbol: string): Promise<QuoteResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const q = parsePayload(
					quoteSchema,
					await request('/quote', { symbol: quoteSymbol(symbol) }, symbol),
					SOURCE,
					symbol,
				)
				// Unknown tickers come back as an all-zero quote
				if (!q.c) throw new DataNotFoundError(SOURCE, 'No price in quote', symbol)
				return {
					symbol,
					price: round2(q.c),
					previousClose: q.pc != null ? round2(q.pc) : null,
					source: SOURCE,
					fetchedAt: nowIso(),
				}
			})
		},

		getSecurityInfo(symbol: string): Promise<SecurityInfoResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const profile = parsePayload(
					profileSchema,
					await request('/stock/profile2', { symbol }, symbol),
					SOURCE,
					symbol,
				)
				if (Object.keys(profile).length === 0) {
					throw new DataNotFoundError(SOURCE, 'Empty company profile', symbol)
				}
				const data = securityInfoFrom(profile, {
					name: 'name',
					sector: 'finnhubIndustry',
					industry: undefined,
					fiftyTwoWeekHigh: undefined,
					fiftyTwoWeekLow: undefined,
					avgVolume: undefined,
					avgVolume10d: undefined,
				})
				return { symbol, source: SOURCE, data, fetchedAt: nowIso() }
			})
		},

		getNextEarnings(symbol: string): Promise<EarningsResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const today = new Date()
				const horizon = new Date(today.getTime() + 120 * 86_400_000)
				const body = parsePayload(
					earningsCalendarSchema,
					await request(
						'/calendar/earnings',
						{ symbol, from: toDateString(today), to: toDateString(horizon) },
						symbol,
					),
					SOURCE,
					symbol,
				)
				const upcoming = (body.earningsCalendar ?? [])
					.map((e) => e.date)
					.filter((d) => d >= toDateString(today))
					.sort()
				return {
					symbol,
					source: SOURCE,
					earningsDate: upcoming[0] ?? null,
					method: 'calendar',
					fetchedAt: nowIso(),
				}
			})
		},
	}
}

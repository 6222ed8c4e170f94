import { z } from 'zod'
import { MIN_DAILY_BARS, normalizeBars, periodToSessions } from '../core/bars.js'
import {
	AuthenticationError,
	DataNotFoundError,
	InsufficientDataError,
	ProviderUnavailableError,
	RateLimitError,
} from '../core/errors.js'
import type { Bar, OhlcvResult } from '../types.js'
import { type CallSpec, fetchJson, guardedCall, nowIso, parsePayload } from './base.js'
import { toNum } from './field-maps.js'
import type { IntradayInterval, Provider, ProviderContext, RateLimitConfig } from './types.js'

const SOURCE = 'twelvedata'
const BASE_URL = 'https://api.twelvedata.com'
const MAX_OUTPUTSIZE = 5000

const rateLimits: RateLimitConfig = { perMinute: 8, perDay: 800 }

const INTERVALS: Record<IntradayInterval, { param: string; perSession: number }> = {
	'5m': { param: '5min', perSession: 78 },
	'15m': { param: '15min', perSession: 26 },
	'30m': { param: '30min', perSession: 13 },
	'1h': { param: '1h', perSession: 7 },
}

const seriesSchema = z.object({
	status: z.string().optional(),
	code: z.number().optional(),
	message: z.string().optional(),
	values: z
		.array(
			z.object({
				datetime: z.string(),
				open: z.union([z.string(), z.number()]),
				high: z.union([z.string(), z.number()]),
				low: z.union([z.string(), z.number()]),
				close: z.union([z.string(), z.number()]),
				volume: z.union([z.string(), z.number()]).optional(),
			}),
		)
		.optional(),
})

type Series = z.infer<typeof seriesSchema>

/** TwelveData reports most failures as HTTP 200 with `status: "error"` and an embedded code. */
function raiseEmbeddedError(series: Series, symbol: string): void {
	if (series.status !== 'error') return
	const code = series.code ?? 0
	const message = series.message ?? 'Unknown error'
	if (code === 429) throw new RateLimitError(SOURCE, message, symbol)
	if (code === 401 || code === 403) throw new AuthenticationError(SOURCE, message, symbol)
	if (code === 404 || /not found|invalid|symbol/i.test(message)) {
		throw new DataNotFoundError(SOURCE, message, symbol)
	}
	throw new ProviderUnavailableError(SOURCE, message, symbol)
}

/** `2024-03-01 14:30:00` in UTC → `2024-03-01T14:30:00.000Z` */
function intradayTimestamp(datetime: string): string {
	return new Date(`${datetime.replace(' ', 'T')}Z`).toISOString()
}

function toBars(series: Series, symbol: string, intraday: boolean): Bar[] {
	const values = series.values ?? []
	if (values.length === 0) throw new DataNotFoundError(SOURCE, 'No values in response', symbol)
	return normalizeBars(
		values.map((v) => ({
			timestamp: intraday ? intradayTimestamp(v.datetime) : v.datetime.slice(0, 10),
			open: toNum(v.open) ?? Number.NaN,
			high: toNum(v.high) ?? Number.NaN,
			low: toNum(v.low) ?? Number.NaN,
			close: toNum(v.close) ?? Number.NaN,
			volume: toNum(v.volume) ?? 0,
		})),
	)
}

export function twelvedata(ctx: ProviderContext): Provider {
	const apiKey = (): string | undefined => ctx.config.twelvedataApiKey

	const spec = (symbol: string): CallSpec => ({
		source: SOURCE,
		symbol,
		rateLimits,
		credential: { value: apiKey(), envVar: 'TWELVEDATA_API_KEY' },
	})

	async function fetchSeries(symbol: string, params: Record<string, string>): Promise<Series> {
		const url = new URL(`${BASE_URL}/time_series`)
		url.searchParams.set('symbol', symbol)
		for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value)
		url.searchParams.set('format', 'JSON')
		url.searchParams.set('apikey', apiKey() ?? '')
		const series = parsePayload(seriesSchema, await fetchJson(ctx, SOURCE, url, symbol), SOURCE, symbol)
		raiseEmbeddedError(series, symbol)
		return series
	}

	return {
		name: SOURCE,
		requiresKey: true,
		keyEnvVar: 'TWELVEDATA_API_KEY',
		capabilities: ['priceHistory', 'intraday'],
		priority: { priceHistory: 1, intraday: 1 },
		rateLimits,

		isEnabled(): boolean {
			return !!apiKey()
		},

		getPriceHistory(symbol: string, period: string): Promise<OhlcvResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const outputsize = Math.min(MAX_OUTPUTSIZE, periodToSessions(period))
				const series = await fetchSeries(symbol, { interval: '1day', outputsize: String(outputsize) })
				const bars = toBars(series, symbol, false)
				if (bars.length < MIN_DAILY_BARS) {
					throw new InsufficientDataError(SOURCE, `Only ${bars.length} bars`, symbol)
				}
				return { symbol, period, source: SOURCE, bars, rows: bars.length, fetchedAt: nowIso() }
			})
		},

		getIntraday(symbol: string, interval: IntradayInterval, period: string): Promise<OhlcvResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const { param, perSession } = INTERVALS[interval]
				const outputsize = Math.min(MAX_OUTPUTSIZE, periodToSessions(period) * perSession)
				const series = await fetchSeries(symbol, {
					interval: param,
					outputsize: String(outputsize),
					timezone: 'UTC',
				})
				const bars = toBars(series, symbol, true)
				return { symbol, period, source: SOURCE, bars, rows: bars.length, fetchedAt: nowIso() }
			})
		},
	}
}

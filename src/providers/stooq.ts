import { MIN_DAILY_BARS, normalizeBars, periodToDays } from '../core/bars.js'
import { DataNotFoundError, InsufficientDataError, ProviderUnavailableError } from '../core/errors.js'
import type { Bar, OhlcvResult } from '../types.js'
import { fetchText, guardedCall, nowIso } from './base.js'
import { toNum } from './field-maps.js'
import type { Provider, ProviderContext, RateLimitConfig } from './types.js'

const SOURCE = 'stooq'
const BASE_URL = 'https://stooq.com/q/d/l/'

const rateLimits: RateLimitConfig = { perMinute: 5 }

const REQUIRED_COLUMNS = ['date', 'open', 'high', 'low', 'close', 'volume'] as const

/** Stooq lists US equities as `aapl.us`; symbols already carrying a market suffix or index caret pass through. */
export function stooqSymbol(symbol: string): string {
	const lower = symbol.toLowerCase()
	return lower.includes('.') || lower.startsWith('^') ? lower : `${lower}.us`
}

function compactDate(d: Date): string {
	return d.toISOString().slice(0, 10).replaceAll('-', '')
}

export function parseStooqCsv(csv: string, symbol: string): Bar[] {
	const lines = csv
		.trim()
		.split(/\r?\n/)
		.filter((l) => l.trim() !== '')
	if (lines.length === 0 || /^no data/i.test(lines[0])) {
		throw new DataNotFoundError(SOURCE, 'No data returned', symbol)
	}
	const header = lines[0].split(',').map((h) => h.trim().toLowerCase())
	const index = Object.fromEntries(REQUIRED_COLUMNS.map((c) => [c, header.indexOf(c)]))
	const missing = REQUIRED_COLUMNS.filter((c) => index[c] === -1)
	if (missing.length > 0) {
		throw new ProviderUnavailableError(SOURCE, `Missing columns: ${missing.join(', ')}`, symbol)
	}
	return normalizeBars(
		lines.slice(1).map((line) => {
			const cells = line.split(',')
			return {
				timestamp: (cells[index.date] ?? '').trim(),
				open: toNum(cells[index.open]) ?? Number.NaN,
				high: toNum(cells[index.high]) ?? Number.NaN,
				low: toNum(cells[index.low]) ?? Number.NaN,
				close: toNum(cells[index.close]) ?? Number.NaN,
				volume: toNum(cells[index.volume]) ?? Number.NaN,
			}
		}),
	)
}

export function stooq(ctx: ProviderContext): Provider {
	return {
		name: SOURCE,
		requiresKey: false,
		capabilities: ['priceHistory'],
		priority: { priceHistory: 3 },
		rateLimits,

		isEnabled(): boolean {
			return true
		},

		getPriceHistory(symbol: string, period: string): Promise<OhlcvResult> {
			return guardedCall(ctx, { source: SOURCE, symbol, rateLimits }, async () => {
				const end = new Date()
				const start = new Date(end.getTime() - periodToDays(period) * 86_400_000)
				const url = new URL(BASE_URL)
				url.searchParams.set('s', stooqSymbol(symbol))
				url.searchParams.set('d1', compactDate(start))
				url.searchParams.set('d2', compactDate(end))
				url.searchParams.set('i', 'd')

				const bars = parseStooqCsv(await fetchText(ctx, SOURCE, url, symbol), symbol)
				if (bars.length === 0) throw new DataNotFoundError(SOURCE, 'No rows in CSV', symbol)
				if (bars.length < MIN_DAILY_BARS) {
					throw new InsufficientDataError(SOURCE, `Only ${bars.length} bars`, symbol)
				}
				return { symbol, period, source: SOURCE, bars, rows: bars.length, fetchedAt: nowIso() }
			})
		},
	}
}

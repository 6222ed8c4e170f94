import type { Bar } from '../types.js'
import { filterBarsByDate, periodForSpan, periodToDays, toDateString } from './bars.js'
import type { DataOrchestrator } from './orchestrator.js'

/** Spans longer than this outgrow what the cache keeps and are fetched directly. */
export const DIRECT_FETCH_SPAN_DAYS = 600

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/

export interface DownloadOptions {
	/** Inclusive `YYYY-MM-DD` bounds */
	start?: string
	end?: string
	/** Lookback used when no start date is given */
	period?: string
}

export interface DownloadResult {
	symbol: string
	source: string
	bars: Bar[]
}

function parseDay(value: string, label: string): number {
	if (!DATE_RE.test(value)) throw new Error(`Invalid ${label} date "${value}" (expected YYYY-MM-DD)`)
	const ms = Date.parse(`${value}T00:00:00Z`)
	if (Number.isNaN(ms)) throw new Error(`Invalid ${label} date "${value}"`)
	return ms
}

function daysBetween(fromMs: number, toMs: number): number {
	return Math.ceil((toMs - fromMs) / 86_400_000)
}

/**
 * Daily bars for a date range, for callers that think in start/end dates
 * instead of lookback periods. A start/end span over 600 days bypasses the
 * cache; everything else goes through the cached path and is trimmed to the
 * range.
 */
export async function downloadOhlcv(
	orchestrator: DataOrchestrator,
	symbol: string,
	options: DownloadOptions = {},
): Promise<DownloadResult> {
	const { start, end } = options
	const startMs = start === undefined ? undefined : parseDay(start, 'start')
	const endMs = end === undefined ? undefined : parseDay(end, 'end')
	if (startMs !== undefined && endMs !== undefined && endMs < startMs) {
		throw new Error(`End date ${end} is before start date ${start}`)
	}

	// The lookback has to reach back to `start` from today
	const today = Date.parse(`${toDateString(new Date())}T00:00:00Z`)
	let period = options.period ?? '2y'
	if (startMs !== undefined) {
		const needed = periodForSpan(daysBetween(startMs, today))
		if (periodToDays(needed) > periodToDays(period)) period = needed
	}

	const log = orchestrator.logger.child({ component: 'download' })

	if (startMs !== undefined && endMs !== undefined && daysBetween(startMs, endMs) > DIRECT_FETCH_SPAN_DAYS) {
		try {
			const direct = await orchestrator.fetchOhlcvDirect(symbol, period)
			return { symbol: direct.symbol, source: direct.source, bars: filterBarsByDate(direct.bars, start, end) }
		} catch (err) {
			log.warn({ symbol, period, err }, 'direct fetch failed, falling back to cached history')
		}
	}

	const result = await orchestrator.getOhlcv(symbol, period)
	return { symbol: result.symbol, source: result.source, bars: filterBarsByDate(result.bars, start, end) }
}

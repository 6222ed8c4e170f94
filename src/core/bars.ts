import type { Bar } from '../types.js'

export const MIN_DAILY_BARS = 10

const PERIOD_RE = /^(\d+)(d|wk|mo|y)$/

const UNIT_DAYS: Record<string, number> = { d: 1, wk: 7, mo: 30, y: 365 }

/** Calendar days covered by a period string such as `5d`, `6mo` or `2y`. */
export function periodToDays(period: string): number {
	const match = PERIOD_RE.exec(period.trim().toLowerCase())
	if (!match) throw new Error(`Invalid period "${period}" (expected e.g. 5d, 3mo, 2y)`)
	const n = Number(match[1])
	if (n <= 0) throw new Error(`Invalid period "${period}"`)
	return n * UNIT_DAYS[match[2]]
}

/** Approximate regular sessions in a period (252 per year). */
export function periodToSessions(period: string): number {
	return Math.max(1, Math.round((periodToDays(period) * 252) / 365))
}

/** Smallest whole-year period string covering the given span of days. */
export function periodForSpan(days: number): string {
	return `${Math.max(1, Math.ceil(days / 365))}y`
}

function isValidBar(bar: Bar): boolean {
	return (
		bar.timestamp.length > 0 &&
		[bar.open, bar.high, bar.low, bar.close, bar.volume].every((v) => Number.isFinite(v) && v >= 0)
	)
}

/**
 * Ascending by timestamp, one bar per timestamp (the last one seen wins),
 * bars with missing, non-finite or negative fields dropped.
 */
export function normalizeBars(bars: Bar[]): Bar[] {
	const byTimestamp = new Map<string, Bar>()
	for (const bar of bars) {
		if (isValidBar(bar)) byTimestamp.set(bar.timestamp, bar)
	}
	return [...byTimestamp.values()].sort((a, b) =>
		a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0,
	)
}

export function toDateString(v: Date): string {
	return v.toISOString().split('T')[0]
}

/** Bars whose date part falls within `[start, end]`, both inclusive `YYYY-MM-DD` bounds. */
export function filterBarsByDate(bars: Bar[], start?: string, end?: string): Bar[] {
	return bars.filter((b) => {
		const day = b.timestamp.slice(0, 10)
		if (start && day < start) return false
		if (end && day > end) return false
		return true
	})
}

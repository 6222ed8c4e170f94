import { DateTime } from 'luxon'
import { DEFAULT_MARKET, type MarketSettings } from './config.js'

/**
 * Next regular-session close at or after `now`, in the exchange's timezone.
 * A close that has already passed today rolls to the next weekday.
 * Exchange holidays are not modelled.
 */
export function nextMarketClose(now: Date, market: MarketSettings = DEFAULT_MARKET): DateTime {
	const zoned = DateTime.fromJSDate(now, { zone: market.timezone })
	const local = zoned.isValid ? zoned : DateTime.fromJSDate(now, { zone: DEFAULT_MARKET.timezone })
	let close = local.set({ hour: market.closeHour, minute: market.closeMinute, second: 0, millisecond: 0 })
	if (local >= close) close = close.plus({ days: 1 })
	// luxon weekday: 6 = Saturday, 7 = Sunday
	while (close.weekday >= 6) close = close.plus({ days: 1 })
	return close
}

/** Daily bars go stale once the next session has closed and the data has had time to propagate. */
export function ohlcvExpiry(now: Date, bufferMinutes: number, market: MarketSettings = DEFAULT_MARKET): Date {
	return nextMarketClose(now, market).plus({ minutes: bufferMinutes }).toJSDate()
}

export function fundamentalsExpiry(now: Date, ttlDays: number): Date {
	return new Date(now.getTime() + ttlDays * 86_400_000)
}

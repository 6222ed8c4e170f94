export type OutputFormat = 'markdown' | 'json' | 'plain'

export interface GlobalOptions {
	format: OutputFormat
	verbose: boolean
}

export type Capability =
	| 'priceHistory'
	| 'intraday'
	| 'fundamentals'
	| 'quote'
	| 'securityInfo'
	| 'earnings'

/** Provenance tags the orchestrator uses for cache-served results. */
export const CACHE_SOURCE = 'cache'
export const STALE_CACHE_SOURCE = 'stale_cache'

export interface Bar {
	/** `YYYY-MM-DD` for daily bars, ISO-8601 date-time for intraday bars */
	timestamp: string
	open: number
	high: number
	low: number
	close: number
	volume: number
}

export interface OhlcvResult {
	symbol: string
	period: string
	source: string
	bars: Bar[]
	rows: number
	fetchedAt: string
}

export const FUNDAMENTALS_FIELDS = [
	'pe',
	'forwardPe',
	'pegRatio',
	'marketCap',
	'roe',
	'roa',
	'roic',
	'epsGrowth',
	'revenueGrowth',
	'debtToEquity',
	'profitMargin',
	'operatingMargin',
	'beta',
	'dividendYield',
] as const

export type FundamentalsField = (typeof FUNDAMENTALS_FIELDS)[number]

export type Fundamentals = Record<FundamentalsField, number | null>

/** Which adapter supplied each non-null field. */
export type FieldSources = Partial<Record<FundamentalsField, string>>

export interface FundamentalsResult {
	symbol: string
	source: string
	data: Fundamentals
	fieldSources: FieldSources
	fetchedAt: string
}

export interface QuoteResult {
	symbol: string
	price: number
	previousClose: number | null
	source: string
	fetchedAt: string
}

export interface SecurityInfo {
	name: string | null
	sector: string | null
	industry: string | null
	fiftyTwoWeekHigh: number | null
	fiftyTwoWeekLow: number | null
	avgVolume: number | null
	avgVolume10d: number | null
}

export interface SecurityInfoResult {
	symbol: string
	source: string
	data: SecurityInfo
	fetchedAt: string
}

export interface EarningsResult {
	symbol: string
	source: string
	/** Next scheduled report date (`YYYY-MM-DD`), null when none is announced */
	earningsDate: string | null
	/** Upstream lookup that produced the date: `calendar` or `quote` */
	method: string | null
	fetchedAt: string
}

export function emptyFundamentals(): Fundamentals {
	return {
		pe: null,
		forwardPe: null,
		pegRatio: null,
		marketCap: null,
		roe: null,
		roa: null,
		roic: null,
		epsGrowth: null,
		revenueGrowth: null,
		debtToEquity: null,
		profitMargin: null,
		operatingMargin: null,
		beta: null,
		dividendYield: null,
	}
}

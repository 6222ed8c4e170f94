import {
	emptyFundamentals,
	type FieldSources,
	type Fundamentals,
	type FundamentalsField,
	FUNDAMENTALS_FIELDS,
	type SecurityInfo,
} from '../types.js'

/**
 * Bump whenever a mapping or unit conversion below changes meaning, so cached
 * fundamentals computed under the old rules stop being served.
 */
export const FUNDAMENTALS_SCHEMA_VERSION = 4

/**
 * Unit of a raw upstream value.
 *   percent   25.0 means 25%
 *   fraction  0.25 means 25%
 *   ratio     plain number, no scaling (P/E, beta, D/E)
 *   millions  currency amount in millions
 *   currency  currency amount
 *   auto      unknown; decided by magnitude (see `convert`)
 */
export type RawUnit = 'percent' | 'fraction' | 'ratio' | 'millions' | 'currency' | 'auto'

type CanonicalUnit = 'percent' | 'fraction' | 'ratio' | 'currency'

/** Unit every canonical field is stored in, whatever the source. */
export const CANONICAL_UNITS: Record<FundamentalsField, CanonicalUnit> = {
	pe: 'ratio',
	forwardPe: 'ratio',
	pegRatio: 'ratio',
	marketCap: 'currency',
	roe: 'percent',
	roa: 'percent',
	roic: 'percent',
	epsGrowth: 'percent',
	revenueGrowth: 'percent',
	debtToEquity: 'ratio',
	profitMargin: 'fraction',
	operatingMargin: 'fraction',
	beta: 'ratio',
	dividendYield: 'fraction',
}

export interface FieldMapping {
	from: string
	unit: RawUnit
}

export type FundamentalsFieldMap = Partial<Record<FundamentalsField, FieldMapping>>

export function toNum(v: unknown): number | null {
	if (typeof v === 'number') return Number.isFinite(v) ? v : null
	if (typeof v === 'string') {
		const trimmed = v.trim()
		if (trimmed === '' || trimmed === 'None' || trimmed === 'NaN') return null
		const n = Number(trimmed.replace(/%$/, ''))
		return Number.isFinite(n) ? n : null
	}
	return null
}

function round(v: number, decimals: number): number {
	const f = 10 ** decimals
	return Math.round(v * f) / f
}

/**
 * Converts a raw value to its canonical unit. Only `auto` values use the
 * magnitude heuristic: below 1 in absolute value is read as a fraction when a
 * percent is wanted, above 1 is read as a percent when a fraction is wanted.
 * Growth rates near ±100% can be misread this way.
 */
export function convert(value: number, raw: RawUnit, target: CanonicalUnit): number {
	if (target === 'currency') {
		return raw === 'millions' ? Math.round(value * 1_000_000) : Math.round(value)
	}
	if (target === 'percent') {
		if (raw === 'fraction' || (raw === 'auto' && Math.abs(value) < 1)) return round(value * 100, 2)
		return value
	}
	if (target === 'fraction') {
		if (raw === 'percent' || (raw === 'auto' && Math.abs(value) > 1)) return round(value / 100, 6)
		return value
	}
	return value
}

/** Applies a field map to a raw upstream record. Unmapped and unparsable fields come back null. */
export function applyFieldMap(raw: Record<string, unknown>, map: FundamentalsFieldMap): Fundamentals {
	const out = emptyFundamentals()
	for (const field of FUNDAMENTALS_FIELDS) {
		const mapping = map[field]
		if (!mapping) continue
		const value = toNum(raw[mapping.from])
		out[field] = value === null ? null : convert(value, mapping.unit, CANONICAL_UNITS[field])
	}
	return out
}

export function sourcesFor(data: Fundamentals, source: string): FieldSources {
	const out: FieldSources = {}
	for (const field of FUNDAMENTALS_FIELDS) {
		if (data[field] !== null) out[field] = source
	}
	return out
}

export function countFilled(data: Fundamentals): number {
	return FUNDAMENTALS_FIELDS.filter((f) => data[f] !== null).length
}

// --- Finnhub: GET /stock/metric?metric=all → metric ---
// No forward P/E in this endpoint (peBasicExclExtraTTM is trailing); later sources fill it.

export const FINNHUB_FUNDAMENTALS: FundamentalsFieldMap = {
	pe: { from: 'peTTM', unit: 'ratio' },
	pegRatio: { from: 'pegRatio', unit: 'ratio' },
	marketCap: { from: 'marketCapitalization', unit: 'millions' },
	roe: { from: 'roeTTM', unit: 'percent' },
	roa: { from: 'roaTTM', unit: 'percent' },
	roic: { from: 'roiTTM', unit: 'percent' },
	debtToEquity: { from: 'totalDebt/totalEquityQuarterly', unit: 'ratio' },
	profitMargin: { from: 'netProfitMarginTTM', unit: 'percent' },
	operatingMargin: { from: 'operatingMarginTTM', unit: 'percent' },
	beta: { from: 'beta', unit: 'ratio' },
	dividendYield: { from: 'dividendYieldIndicatedAnnual', unit: 'percent' },
}

export const FINNHUB_KNOWN_GAPS: FundamentalsField[] = ['epsGrowth', 'revenueGrowth']

// --- FMP: GET /key-metrics-ttm/{symbol} → [0] ---

export const FMP_FUNDAMENTALS: FundamentalsFieldMap = {
	pe: { from: 'peRatioTTM', unit: 'ratio' },
	pegRatio: { from: 'pegRatioTTM', unit: 'ratio' },
	marketCap: { from: 'marketCapTTM', unit: 'currency' },
	roe: { from: 'roeTTM', unit: 'fraction' },
	roa: { from: 'returnOnTangibleAssetsTTM', unit: 'fraction' },
	roic: { from: 'roicTTM', unit: 'fraction' },
	debtToEquity: { from: 'debtToEquityTTM', unit: 'ratio' },
	profitMargin: { from: 'netProfitMarginTTM', unit: 'fraction' },
	operatingMargin: { from: 'operatingProfitMarginTTM', unit: 'fraction' },
	dividendYield: { from: 'dividendYieldTTM', unit: 'fraction' },
}

// --- FMP: GET /financial-growth/{symbol}?period=annual&limit=1 → [0] ---

export const FMP_GROWTH: FundamentalsFieldMap = {
	epsGrowth: { from: 'epsgrowth', unit: 'fraction' },
	revenueGrowth: { from: 'revenueGrowth', unit: 'fraction' },
}

// --- Yahoo: quoteSummary summaryDetail + defaultKeyStatistics + financialData, flattened ---

export const YAHOO_FUNDAMENTALS: FundamentalsFieldMap = {
	pe: { from: 'trailingPE', unit: 'ratio' },
	forwardPe: { from: 'forwardPE', unit: 'ratio' },
	pegRatio: { from: 'pegRatio', unit: 'ratio' },
	marketCap: { from: 'marketCap', unit: 'currency' },
	roe: { from: 'returnOnEquity', unit: 'fraction' },
	roa: { from: 'returnOnAssets', unit: 'fraction' },
	epsGrowth: { from: 'earningsGrowth', unit: 'fraction' },
	revenueGrowth: { from: 'revenueGrowth', unit: 'fraction' },
	debtToEquity: { from: 'debtToEquity', unit: 'ratio' },
	profitMargin: { from: 'profitMargins', unit: 'fraction' },
	operatingMargin: { from: 'operatingMargins', unit: 'fraction' },
	beta: { from: 'beta', unit: 'ratio' },
	// Reported as a fraction by some Yahoo endpoints and as a percent by others
	dividendYield: { from: 'dividendYield', unit: 'auto' },
}

// --- Security metadata ---

export function securityInfoFrom(
	raw: Record<string, unknown>,
	fields: Record<keyof SecurityInfo, string | undefined>,
): SecurityInfo {
	const text = (key: string | undefined): string | null => {
		if (!key) return null
		const v = raw[key]
		return typeof v === 'string' && v.trim() !== '' ? v : null
	}
	const num = (key: string | undefined): number | null => (key ? toNum(raw[key]) : null)
	const int = (key: string | undefined): number | null => {
		const v = num(key)
		return v === null ? null : Math.round(v)
	}
	return {
		name: text(fields.name),
		sector: text(fields.sector),
		industry: text(fields.industry),
		fiftyTwoWeekHigh: num(fields.fiftyTwoWeekHigh),
		fiftyTwoWeekLow: num(fields.fiftyTwoWeekLow),
		avgVolume: int(fields.avgVolume),
		avgVolume10d: int(fields.avgVolume10d),
	}
}

import { z } from 'zod'
import { DataNotFoundError } from '../core/errors.js'
import { emptyFundamentals, type FundamentalsField, type FundamentalsResult } from '../types.js'
import { acquireAdditionalToken, type CallSpec, fetchJson, guardedCall, nowIso, parsePayload } from './base.js'
import { applyFieldMap, FMP_FUNDAMENTALS, FMP_GROWTH, sourcesFor } from './field-maps.js'
import type { Provider, ProviderContext, RateLimitConfig } from './types.js'

const SOURCE = 'fmp'
const BASE_URL = 'https://financialmodelingprep.com/api/v3'

const rateLimits: RateLimitConfig = { perMinute: 10, perDay: 250 }

const recordSchema = z.record(z.string(), z.unknown())
const rowsSchema = z.union([z.array(recordSchema), recordSchema])

/** FMP answers with a one-element array, an object, or an empty array for unknown tickers. */
function firstRow(data: z.infer<typeof rowsSchema>): Record<string, unknown> | undefined {
	if (Array.isArray(data)) return data[0]
	return Object.keys(data).length > 0 ? data : undefined
}

export function fmp(ctx: ProviderContext): Provider {
	const apiKey = (): string | undefined => ctx.config.fmpApiKey

	const spec = (symbol: string): CallSpec => ({
		source: SOURCE,
		symbol,
		rateLimits,
		credential: { value: apiKey(), envVar: 'FMP_API_KEY' },
	})

	async function request(path: string, params: Record<string, string>, symbol: string) {
		const url = new URL(`${BASE_URL}${path}/${encodeURIComponent(symbol)}`)
		for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value)
		url.searchParams.set('apikey', apiKey() ?? '')
		return parsePayload(rowsSchema, await fetchJson(ctx, SOURCE, url, symbol), SOURCE, symbol)
	}

	async function fetchKeyMetrics(symbol: string): Promise<Record<string, unknown>> {
		const row = firstRow(await request('/key-metrics-ttm', {}, symbol))
		if (!row) throw new DataNotFoundError(SOURCE, 'Empty key-metrics response', symbol)
		return row
	}

	/** Missing growth data is not an error; the fields simply stay null. */
	async function fetchGrowth(symbol: string): Promise<Record<string, unknown>> {
		return firstRow(await request('/financial-growth', { period: 'annual', limit: '1' }, symbol)) ?? {}
	}

	return {
		name: SOURCE,
		requiresKey: true,
		keyEnvVar: 'FMP_API_KEY',
		capabilities: ['fundamentals'],
		priority: { fundamentals: 2 },
		rateLimits,

		isEnabled(): boolean {
			return !!apiKey()
		},

		/** Key metrics plus growth; two upstream calls, two tokens. */
		getFundamentals(symbol: string): Promise<FundamentalsResult> {
			const callSpec = spec(symbol)
			return guardedCall(ctx, callSpec, async () => {
				const data = applyFieldMap(await fetchKeyMetrics(symbol), FMP_FUNDAMENTALS)
				acquireAdditionalToken(ctx, callSpec)
				const growth = applyFieldMap(await fetchGrowth(symbol), FMP_GROWTH)
				for (const field of ['epsGrowth', 'revenueGrowth'] as const) {
					if (data[field] === null) data[field] = growth[field]
				}
				return { symbol, source: SOURCE, data, fieldSources: sourcesFor(data, SOURCE), fetchedAt: nowIso() }
			})
		},

		/** Growth metrics only, for filling another source's gaps at the cost of one call. */
		getFundamentalsFields(symbol: string, fields: FundamentalsField[]): Promise<FundamentalsResult> {
			return guardedCall(ctx, spec(symbol), async () => {
				const growth = applyFieldMap(await fetchGrowth(symbol), FMP_GROWTH)
				const data = emptyFundamentals()
				for (const field of fields) data[field] = growth[field]
				return { symbol, source: SOURCE, data, fieldSources: sourcesFor(data, SOURCE), fetchedAt: nowIso() }
			})
		},
	}
}

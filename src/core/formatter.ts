import type { OutputFormat } from '../types.js'

export type Cell = string | number | boolean | undefined | null

const MISSING = '-'

export function formatTable(headers: string[], rows: Cell[][], format: OutputFormat): string {
	if (format === 'json') {
		return JSON.stringify(
			rows.map((row) => {
				const obj: Record<string, string | number | boolean | null> = {}
				for (let i = 0; i < headers.length; i++) {
					obj[headers[i]] = row[i] ?? null
				}
				return obj
			}),
			null,
			2,
		)
	}

	if (format === 'plain') {
		const headerLine = headers.join('\t')
		const dataLines = rows.map((row) => row.map((v) => (v == null ? '' : String(v))).join('\t'))
		return [headerLine, ...dataLines].join('\n')
	}

	// Markdown table
	const text = (v: Cell): string => (v == null ? MISSING : String(v))
	const colWidths = headers.map((h, i) => {
		const maxData = rows.reduce((max, row) => Math.max(max, text(row[i]).length), 0)
		return Math.max(h.length, maxData)
	})

	const headerLine = `| ${headers.map((h, i) => h.padEnd(colWidths[i])).join(' | ')} |`
	const separator = `| ${colWidths.map((w) => '-'.repeat(w)).join(' | ')} |`
	const dataLines = rows.map((row) => `| ${row.map((v, i) => text(v).padEnd(colWidths[i])).join(' | ')} |`)

	return [headerLine, separator, ...dataLines].join('\n')
}

/**
 * Key/value block. JSON keeps null values so consumers see every key;
 * the text forms show them as `-`.
 */
export function formatKeyValue(data: Record<string, Cell>, format: OutputFormat): string {
	if (format === 'json') {
		const obj: Record<string, string | number | boolean | null> = {}
		for (const [k, v] of Object.entries(data)) obj[k] = v ?? null
		return JSON.stringify(obj, null, 2)
	}

	const entries = Object.entries(data).map(([k, v]): [string, string] => [k, v == null ? MISSING : String(v)])

	if (format === 'plain') {
		return entries.map(([k, v]) => `${k}\t${v}`).join('\n')
	}

	// Markdown key-value
	const maxKeyLen = entries.reduce((max, [k]) => Math.max(max, k.length), 0)
	return entries.map(([k, v]) => `**${k.padEnd(maxKeyLen)}**: ${v}`).join('\n')
}

export function formatNumber(n: number | null, decimals = 2): string {
	if (n === null) return MISSING
	if (Math.abs(n) >= 1e12) return `${(n / 1e12).toFixed(decimals)}T`
	if (Math.abs(n) >= 1e9) return `${(n / 1e9).toFixed(decimals)}B`
	if (Math.abs(n) >= 1e6) return `${(n / 1e6).toFixed(decimals)}M`
	if (Math.abs(n) >= 1e3) return `${(n / 1e3).toFixed(decimals)}K`
	return n.toFixed(decimals)
}

export function formatPrice(n: number | null): string {
	return n === null ? MISSING : n.toFixed(2)
}

/** Value already expressed in percent (25 → `25.00%`). */
export function formatPercent(n: number | null): string {
	return n === null ? MISSING : `${n.toFixed(2)}%`
}

/** Value expressed as a fraction (0.25 → `25.00%`). */
export function formatFraction(n: number | null): string {
	return n === null ? MISSING : `${(n * 100).toFixed(2)}%`
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`
	const s = Math.ceil(ms / 1000)
	return s < 60 ? `${s}s` : `${Math.floor(s / 60)}m ${s % 60}s`
}

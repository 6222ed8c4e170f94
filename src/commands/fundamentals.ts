import type { Command } from 'commander'
import { formatFraction, formatNumber, formatPercent, formatTable } from '../core/formatter.js'
import { CANONICAL_UNITS } from '../providers/field-maps.js'
import { type FundamentalsField, FUNDAMENTALS_FIELDS, type FundamentalsResult, type GlobalOptions } from '../types.js'
import { getOrchestrator, sourceLine } from './context.js'

function formatField(field: FundamentalsField, value: number | null): string {
	switch (CANONICAL_UNITS[field]) {
		case 'percent':
			return formatPercent(value)
		case 'fraction':
			return formatFraction(value)
		case 'currency':
			return formatNumber(value)
		default:
			return value === null ? '-' : value.toFixed(2)
	}
}

export function fundamentalsRows(result: FundamentalsResult): string[][] {
	return FUNDAMENTALS_FIELDS.map((field) => [
		field,
		formatField(field, result.data[field]),
		result.fieldSources[field] ?? '',
	])
}

export function registerFundamentalsCommand(program: Command): void {
	program
		.command('fundamentals <symbol>')
		.description('Fundamentals merged field by field across sources')
		.action(async (symbol: string) => {
			const opts = program.opts<GlobalOptions>()
			const result = await getOrchestrator(program).getFundamentals(symbol)

			if (opts.format === 'json') {
				console.log(JSON.stringify(result, null, 2))
				return
			}

			console.log(formatTable(['Field', 'Value', 'From'], fundamentalsRows(result), opts.format))
			console.log(sourceLine(result.source, `fetched ${result.fetchedAt}`))
		})
}

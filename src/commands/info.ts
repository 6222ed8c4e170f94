import type { Command } from 'commander'
import { formatKeyValue, formatNumber, formatPrice } from '../core/formatter.js'
import type { GlobalOptions } from '../types.js'
import { getOrchestrator } from './context.js'

export function registerInfoCommand(program: Command): void {
	program
		.command('info <symbol>')
		.description('Name, sector, 52-week range and average volume')
		.action(async (symbol: string) => {
			const opts = program.opts<GlobalOptions>()
			const result = await getOrchestrator(program).getStockInfo(symbol)
			const d = result.data

			if (opts.format === 'json') {
				console.log(JSON.stringify(result, null, 2))
				return
			}

			console.log(
				formatKeyValue(
					{
						Symbol: result.symbol,
						Name: d.name,
						Sector: d.sector,
						Industry: d.industry,
						'52w High': formatPrice(d.fiftyTwoWeekHigh),
						'52w Low': formatPrice(d.fiftyTwoWeekLow),
						'Avg Volume': formatNumber(d.avgVolume, 1),
						'Avg Volume 10d': formatNumber(d.avgVolume10d, 1),
						Source: result.source,
					},
					opts.format,
				),
			)
		})
}

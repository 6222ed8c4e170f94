import type { Command } from 'commander'
import { formatKeyValue } from '../core/formatter.js'
import type { GlobalOptions } from '../types.js'
import { getOrchestrator } from './context.js'

export function registerEarningsCommand(program: Command): void {
	program
		.command('earnings <symbol>')
		.description('Next scheduled earnings date')
		.action(async (symbol: string) => {
			const opts = program.opts<GlobalOptions>()
			const result = await getOrchestrator(program).getEarnings(symbol)

			if (result.earningsDate === null && opts.format !== 'json') {
				console.log(`No upcoming earnings date announced for ${result.symbol}.`)
				return
			}

			console.log(
				formatKeyValue(
					{
						Symbol: result.symbol,
						'Next Earnings': result.earningsDate,
						Method: result.method,
						Source: result.source,
					},
					opts.format,
				),
			)
		})
}

import type { Command } from 'commander'
import { formatTable } from '../core/formatter.js'
import { INTRADAY_INTERVALS } from '../core/orchestrator.js'
import type { IntradayInterval } from '../providers/types.js'
import type { GlobalOptions } from '../types.js'
import { getOrchestrator, sourceLine } from './context.js'
import { BAR_HEADERS, barRows } from './history.js'

function parseInterval(raw: string): IntradayInterval {
	const interval = INTRADAY_INTERVALS.find((i) => i === raw)
	if (!interval) throw new Error(`Invalid interval "${raw}". Valid: ${INTRADAY_INTERVALS.join(', ')}`)
	return interval
}

export function registerIntradayCommand(program: Command): void {
	program
		.command('intraday <symbol>')
		.description('Intraday OHLCV bars (never cached)')
		.option('-i, --interval <interval>', `bar size (${INTRADAY_INTERVALS.join(', ')})`, '1h')
		.option('-p, --period <period>', 'lookback, e.g. 5d, 60d', '60d')
		.option('-n, --last <n>', 'only show the most recent n bars', '20')
		.action(async (symbol: string, cmdOpts: { interval: string; period: string; last: string }) => {
			const opts = program.opts<GlobalOptions>()
			const interval = parseInterval(cmdOpts.interval)
			const result = await getOrchestrator(program).getIntraday(symbol, interval, cmdOpts.period)

			if (opts.format === 'json') {
				console.log(JSON.stringify(result, null, 2))
				return
			}

			const last = Number.parseInt(cmdOpts.last, 10)
			const shown = Number.isFinite(last) && last > 0 ? result.bars.slice(-last) : result.bars
			console.log(formatTable(BAR_HEADERS, barRows(shown), opts.format))
			console.log(sourceLine(result.source, `${result.rows} bars @ ${interval}`))
		})
}

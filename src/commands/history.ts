import type { Command } from 'commander'
import { downloadOhlcv } from '../core/download.js'
import { formatNumber, formatPrice, formatTable } from '../core/formatter.js'
import type { Bar, GlobalOptions } from '../types.js'
import { getOrchestrator, sourceLine } from './context.js'

export function barRows(bars: Bar[]): (string | number)[][] {
	return bars.map((b) => [
		b.timestamp,
		formatPrice(b.open),
		formatPrice(b.high),
		formatPrice(b.low),
		formatPrice(b.close),
		formatNumber(b.volume, 0),
	])
}

export const BAR_HEADERS = ['Date', 'Open', 'High', 'Low', 'Close', 'Volume']

export function registerHistoryCommand(program: Command): void {
	program
		.command('history <symbol>')
		.description('Daily OHLCV bars (cache-first)')
		.option('-p, --period <period>', 'lookback, e.g. 6mo, 1y, 2y', '2y')
		.option('--start <date>', 'first day to include (YYYY-MM-DD)')
		.option('--end <date>', 'last day to include (YYYY-MM-DD)')
		.option('-n, --last <n>', 'only show the most recent n bars', '20')
		.action(
			async (
				symbol: string,
				cmdOpts: { period: string; start?: string; end?: string; last: string },
			) => {
				const opts = program.opts<GlobalOptions>()
				const orchestrator = getOrchestrator(program)

				const ranged = cmdOpts.start !== undefined || cmdOpts.end !== undefined
				const { source, bars } = ranged
					? await downloadOhlcv(orchestrator, symbol, {
							start: cmdOpts.start,
							end: cmdOpts.end,
							period: cmdOpts.period,
						})
					: await orchestrator.getOhlcv(symbol, cmdOpts.period)

				if (opts.format === 'json') {
					console.log(JSON.stringify({ symbol: symbol.toUpperCase(), source, bars }, null, 2))
					return
				}

				const last = Number.parseInt(cmdOpts.last, 10)
				const shown = Number.isFinite(last) && last > 0 ? bars.slice(-last) : bars
				console.log(formatTable(BAR_HEADERS, barRows(shown), opts.format))
				console.log(sourceLine(source, `${bars.length} bars`))
			},
		)
}

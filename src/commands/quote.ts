import type { Command } from 'commander'
import { formatKeyValue, formatPercent, formatPrice, formatTable } from '../core/formatter.js'
import type { GlobalOptions, QuoteResult } from '../types.js'
import { getOrchestrator } from './context.js'

function changePercent(q: QuoteResult): number | null {
	if (!q.previousClose) return null
	return ((q.price - q.previousClose) / q.previousClose) * 100
}

export function registerQuoteCommand(program: Command): void {
	program
		.command('quote <symbols...>')
		.description('Current price and previous close')
		.action(async (symbols: string[]) => {
			const opts = program.opts<GlobalOptions>()
			const orchestrator = getOrchestrator(program)

			if (symbols.length === 1) {
				const q = await orchestrator.getQuote(symbols[0])
				console.log(
					formatKeyValue(
						{
							Symbol: q.symbol,
							Price: formatPrice(q.price),
							'Prev Close': formatPrice(q.previousClose),
							Change: formatPercent(changePercent(q)),
							Source: q.source,
						},
						opts.format,
					),
				)
				return
			}

			// One at a time: concurrent calls would only race each other for the same tokens
			const quotes: QuoteResult[] = []
			for (const symbol of symbols) quotes.push(await orchestrator.getQuote(symbol))

			const rows = quotes.map((q) => [
				q.symbol,
				formatPrice(q.price),
				formatPrice(q.previousClose),
				formatPercent(changePercent(q)),
				q.source,
			])
			console.log(formatTable(['Symbol', 'Price', 'Prev Close', 'Change', 'Source'], rows, opts.format))
		})
}

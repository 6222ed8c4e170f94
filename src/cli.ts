#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { registerCacheCommand } from './commands/cache.js'
import { registerConfigCommand } from './commands/config.js'
import { registerEarningsCommand } from './commands/earnings.js'
import { registerFundamentalsCommand } from './commands/fundamentals.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerInfoCommand } from './commands/info.js'
import { registerIntradayCommand } from './commands/intraday.js'
import { registerQuoteCommand } from './commands/quote.js'
import { registerStatusCommand } from './commands/status.js'
import { AllSourcesExhaustedError } from './core/errors.js'
import type { OutputFormat } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'))

const program = new Command()

program
	.name('smd')
	.description('Swing-trading market data with cached, multi-source fallback')
	.version(pkg.version)
	.option('--json', 'output as JSON')
	.option('--plain', 'output as tab-separated values')
	.option('-v, --verbose', 'debug logging on stderr')
	.hook('preAction', () => {
		// Normalize format option
		const rawOpts = program.opts()
		let format: OutputFormat = 'markdown'
		if (rawOpts.json) format = 'json'
		else if (rawOpts.plain) format = 'plain'
		program.setOptionValue('format', format)
	})

registerHistoryCommand(program)
registerIntradayCommand(program)
registerFundamentalsCommand(program)
registerQuoteCommand(program)
registerInfoCommand(program)
registerEarningsCommand(program)
registerStatusCommand(program)
registerCacheCommand(program)
registerConfigCommand(program)

program.parseAsync(process.argv).catch((err: unknown) => {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
	if (err instanceof AllSourcesExhaustedError && program.opts().verbose) {
		for (const r of err.reasons) console.error(`  ${r.source} (${r.kind}): ${r.message}`)
	}
	process.exit(1)
})

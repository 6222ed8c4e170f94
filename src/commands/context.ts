import type { Command } from 'commander'
import { loadConfig } from '../core/config.js'
import { createLogger } from '../core/logger.js'
import { createOrchestrator, type DataOrchestrator } from '../core/orchestrator.js'
import type { GlobalOptions } from '../types.js'

let orchestrator: DataOrchestrator | null = null

/** One orchestrator per CLI process, built on first use so `config` commands never touch adapters. */
export function getOrchestrator(program: Command): DataOrchestrator {
	if (orchestrator) return orchestrator
	const opts = program.opts<GlobalOptions>()
	const logger = createLogger(opts.verbose ? 'debug' : loadConfig().logLevel)
	orchestrator = createOrchestrator({ logger })
	return orchestrator
}

export function sourceLine(source: string, detail?: string): string {
	return `\nSource: ${source}${detail ? ` · ${detail}` : ''}`
}

import type { Command } from 'commander'
import { formatDuration, formatTable } from '../core/formatter.js'
import type { OrchestratorStatus } from '../core/orchestrator.js'
import type { GlobalOptions } from '../types.js'
import { getOrchestrator } from './context.js'

export function statusRows(status: OrchestratorStatus): string[][] {
	return status.providers.map((p) => {
		const breaker = status.breakers[p.name]
		const limiter = status.limiters[p.name]
		const key = p.requiresKey ? (p.configured ? 'configured' : `missing ${p.keyEnvVar ?? ''}`.trim()) : 'none'
		const daily = limiter.dailyLimit === null ? '-' : `${limiter.dailyRemaining ?? 0}/${limiter.dailyLimit}`
		return [
			p.name,
			key,
			breaker.state,
			`${limiter.tokensAvailable}/${limiter.maxPerMinute}`,
			daily,
			p.capabilities.join(', '),
		]
	})
}

export function registerStatusCommand(program: Command): void {
	program
		.command('status')
		.description('Sources, keys, circuit breakers and rate-limit headroom')
		.action(() => {
			const opts = program.opts<GlobalOptions>()
			const status = getOrchestrator(program).status()

			if (opts.format === 'json') {
				console.log(JSON.stringify(status, null, 2))
				return
			}

			console.log(
				formatTable(
					['Source', 'API Key', 'Breaker', 'Tokens/min', 'Daily Left', 'Capabilities'],
					statusRows(status),
					opts.format,
				),
			)
			const recovery = Object.values(status.breakers)[0]?.recoveryTimeoutMs
			if (recovery !== undefined) console.log(`\nOpen breakers re-probe after ${formatDuration(recovery)}`)
		})
}

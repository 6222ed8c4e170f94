import type { Command } from 'commander'
import {
	type ConfigFile,
	getConfigPath,
	getConfigProblem,
	LOG_LEVELS,
	loadConfig,
	parseLogLevel,
	saveConfig,
} from '../core/config.js'

const KEY_FIELDS = ['twelvedataApiKey', 'finnhubApiKey', 'fmpApiKey'] as const

export const SETTABLE_KEYS = [
	...KEY_FIELDS,
	'cacheDir',
	'logLevel',
	'requestTimeoutMs',
	'fundamentalsTtlDays',
	'ohlcvExpiryBufferMinutes',
	'disabledSources',
]

/** Parses `config set` input into a partial config file; values are validated on save. */
export function configEntry(key: string, value: string): ConfigFile {
	const num = (): number => {
		const n = Number(value)
		if (value.trim() === '' || !Number.isFinite(n)) throw new Error(`${key} must be a number`)
		return n
	}
	switch (key) {
		case 'twelvedataApiKey':
			return { twelvedataApiKey: value }
		case 'finnhubApiKey':
			return { finnhubApiKey: value }
		case 'fmpApiKey':
			return { fmpApiKey: value }
		case 'cacheDir':
			return { cacheDir: value }
		case 'logLevel': {
			const logLevel = parseLogLevel(value)
			if (!logLevel) throw new Error(`Invalid log level: ${value}. Valid: ${LOG_LEVELS.join(', ')}`)
			return { logLevel }
		}
		case 'requestTimeoutMs':
			return { requestTimeoutMs: num() }
		case 'fundamentalsTtlDays':
			return { fundamentalsTtlDays: num() }
		case 'ohlcvExpiryBufferMinutes':
			return { ohlcvExpiryBufferMinutes: num() }
		case 'disabledSources':
			return {
				disabledSources: value
					.split(',')
					.map((s) => s.trim())
					.filter(Boolean),
			}
		default:
			throw new Error(`Invalid key: ${key}. Valid keys: ${SETTABLE_KEYS.join(', ')}`)
	}
}

export function registerConfigCommand(program: Command): void {
	const config = program.command('config').description('Manage configuration')

	config
		.command('show')
		.description('Show current configuration')
		.action(() => {
			const cfg = loadConfig()
			console.log(`Config file: ${getConfigPath()}\n`)
			const problem = getConfigProblem()
			if (problem) console.log(`Ignored: ${problem}\n`)
			const masked: Record<string, unknown> = { ...cfg }
			for (const field of KEY_FIELDS) {
				masked[field] = cfg[field] ? '***configured***' : undefined
			}
			console.log(JSON.stringify(masked, null, 2))
		})

	config
		.command('set <key> <value>')
		.description('Set a configuration value')
		.action((key: string, value: string) => {
			saveConfig(configEntry(key, value))
			console.log(`Set ${key} = ${key.endsWith('ApiKey') ? '***' : value}`)
		})

	config
		.command('path')
		.description('Show config file path')
		.action(() => {
			console.log(getConfigPath())
		})
}

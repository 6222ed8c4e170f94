import type { Command } from 'commander'
import { type CacheStats, CacheStore } from '../core/cache.js'
import { loadConfig } from '../core/config.js'
import { formatDuration, formatFraction, formatNumber, formatTable } from '../core/formatter.js'
import type { GlobalOptions } from '../types.js'
import { getOrchestrator } from './context.js'

export function cacheStatsRows(stats: CacheStats): string[][] {
	return Object.entries(stats.byType)
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([type, s]) => [
			type,
			String(s.entries),
			String(s.fresh),
			String(s.expired),
			String(s.freshHits),
			String(s.staleHits),
			String(s.misses),
			formatFraction(s.hitRate),
		])
}

export function registerCacheCommand(program: Command): void {
	const cache = program.command('cache').description('Inspect, warm or clear the local cache')

	cache
		.command('list')
		.description('List cached entries')
		.action(() => {
			const opts = program.opts<GlobalOptions>()
			const entries = new CacheStore(loadConfig().cacheDir).list()

			if (entries.length === 0 && opts.format !== 'json') {
				console.log('Cache is empty.')
				return
			}

			const rows = entries.map((e) => [
				e.key,
				e.source,
				formatDuration(e.ageMs),
				e.expiresAt,
				e.expired ? 'stale' : 'fresh',
				e.meta?.period,
				e.schemaVersion,
			])
			console.log(
				formatTable(['Key', 'Source', 'Age', 'Expires', 'State', 'Period', 'Schema'], rows, opts.format),
			)
		})

	cache
		.command('stats')
		.description('Entry counts and hit rates per data type')
		.option('--reset', 'reset the hit counters after printing')
		.action((cmdOpts: { reset?: boolean }) => {
			const opts = program.opts<GlobalOptions>()
			const store = new CacheStore(loadConfig().cacheDir)
			const stats = store.stats()

			if (opts.format === 'json') {
				console.log(JSON.stringify(stats, null, 2))
			} else {
				console.log(
					formatTable(
						['Type', 'Entries', 'Fresh', 'Expired', 'Hits', 'Stale Hits', 'Misses', 'Hit Rate'],
						cacheStatsRows(stats),
						opts.format,
					),
				)
				const oldest = stats.oldestAgeMs === null ? '-' : formatDuration(stats.oldestAgeMs)
				console.log(`\n${stats.entries} entries · ${formatNumber(stats.bytes, 0)} bytes · oldest ${oldest}`)
				if (stats.countingSince) console.log(`Counting since ${stats.countingSince}`)
			}
			if (cmdOpts.reset) store.resetStats()
		})

	cache
		.command('warm <symbols...>')
		.description('Prefetch daily bars and fundamentals into the cache')
		.option('-p, --period <period>', 'history period to cache', '2y')
		.action(async (symbols: string[], cmdOpts: { period: string }) => {
			const opts = program.opts<GlobalOptions>()
			const outcomes = await getOrchestrator(program).warm(symbols, cmdOpts.period)

			if (opts.format === 'json') {
				console.log(JSON.stringify(outcomes, null, 2))
			} else {
				const rows = outcomes.map((o) => [o.symbol, o.capability, o.ok ? o.source : `failed: ${o.error}`])
				console.log(formatTable(['Symbol', 'Data', 'Result'], rows, opts.format))
			}
			if (outcomes.some((o) => !o.ok)) process.exitCode = 1
		})

	cache
		.command('clear [key]')
		.description('Remove one entry (e.g. ohlcv:AAPL) or everything')
		.action((key?: string) => {
			const store = new CacheStore(loadConfig().cacheDir)
			store.clear(key)
			console.log(key ? `Removed ${key}` : `Cleared ${store.dir}`)
		})
}

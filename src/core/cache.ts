import {
	existsSync,
	mkdirSync,
	readdirSync,
	readFileSync,
	renameSync,
	rmSync,
	statSync,
	writeFileSync,
} from 'node:fs'
import { join } from 'node:path'
import { z } from 'zod'
import { type Logger, silentLogger } from './logger.js'

const entrySchema = z.object({
	key: z.string(),
	payload: z.unknown(),
	source: z.string(),
	cachedAt: z.string(),
	expiresAt: z.string(),
	schemaVersion: z.number().int().optional(),
	meta: z.record(z.string(), z.union([z.string(), z.number()])).optional(),
})

export type CacheEntry = z.infer<typeof entrySchema>

const lookupCountsSchema = z.object({
	freshHits: z.number().int().nonnegative(),
	staleHits: z.number().int().nonnegative(),
	misses: z.number().int().nonnegative(),
})

const countersSchema = z.object({
	since: z.string(),
	types: z.record(z.string(), lookupCountsSchema),
})

export type LookupCounts = z.infer<typeof lookupCountsSchema>
type Counters = z.infer<typeof countersSchema>

/** How a cache-first read was answered. */
export type LookupOutcome = 'fresh_hit' | 'stale_hit' | 'miss'

// Not a .json file, so entry listing never picks it up
const COUNTERS_FILE = 'lookups.counters'

export interface PutOptions {
	source: string
	expiresAt: Date
	schemaVersion?: number
	meta?: Record<string, string | number>
}

export interface ReadOptions {
	/** Entries written under a different schema version read as misses. */
	schemaVersion?: number
}

export interface CacheEntryInfo {
	key: string
	source: string
	cachedAt: string
	expiresAt: string
	expired: boolean
	ageMs: number
	schemaVersion?: number
	meta?: Record<string, string | number>
}

export interface CacheTypeStats extends LookupCounts {
	entries: number
	fresh: number
	expired: number
	/** freshHits / (freshHits + misses); null before the first lookup */
	hitRate: number | null
}

export interface CacheStats {
	dir: string
	entries: number
	fresh: number
	expired: number
	bytes: number
	oldestAgeMs: number | null
	/** When lookup counting started */
	countingSince: string | null
	byType: Record<string, CacheTypeStats>
}

/** Data type of a key: the part before the first colon (`ohlcv`, `fundamentals`). */
export function keyType(key: string): string {
	const idx = key.indexOf(':')
	return idx === -1 ? key : key.slice(0, idx)
}

function emptyCounts(): LookupCounts {
	return { freshHits: 0, staleHits: 0, misses: 0 }
}

function hitRate(counts: LookupCounts): number | null {
	const lookups = counts.freshHits + counts.misses
	return lookups === 0 ? null : counts.freshHits / lookups
}

export function ohlcvKey(symbol: string): string {
	return `ohlcv:${symbol}`
}

export function fundamentalsKey(symbol: string): string {
	return `fundamentals:${symbol}`
}

/**
 * Persistent key-value store with TTL. One JSON document per key under `dir`;
 * writes land in a temp file that is renamed over the old one, so concurrent
 * writers to a key resolve as last-write-wins. Expired entries are kept and
 * stay readable through `getStale`.
 */
export class CacheStore {
	private readonly log: Logger
	private counters: Counters | undefined

	constructor(
		readonly dir: string,
		logger: Logger = silentLogger,
	) {
		this.log = logger.child({ component: 'cache' })
	}

	private pathFor(key: string): string {
		return join(this.dir, `${encodeURIComponent(key)}.json`)
	}

	private read(key: string): CacheEntry | undefined {
		const path = this.pathFor(key)
		if (!existsSync(path)) return undefined
		try {
			const parsed = entrySchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')))
			if (parsed.success) return parsed.data
			this.log.warn({ key }, 'ignoring cache entry with unexpected shape')
		} catch (err) {
			this.log.warn({ key, err }, 'ignoring unreadable cache entry')
		}
		return undefined
	}

	private matchesVersion(entry: CacheEntry, options: ReadOptions): boolean {
		if (options.schemaVersion === undefined) return true
		if (entry.schemaVersion === options.schemaVersion) return true
		this.log.debug(
			{ key: entry.key, cached: entry.schemaVersion, current: options.schemaVersion },
			'cache entry written under another schema version',
		)
		return false
	}

	/** Entry (payload and metadata) only while `now < expiresAt`. */
	getFreshEntry(key: string, options: ReadOptions = {}): CacheEntry | undefined {
		const entry = this.read(key)
		if (!entry || !this.matchesVersion(entry, options)) return undefined
		if (Date.now() >= Date.parse(entry.expiresAt)) return undefined
		return entry
	}

	getFresh(key: string, options: ReadOptions = {}): unknown {
		return this.getFreshEntry(key, options)?.payload
	}

	/** Entry regardless of expiry; the orchestrator's last resort. */
	getStaleEntry(key: string, options: ReadOptions = {}): CacheEntry | undefined {
		const entry = this.read(key)
		if (!entry || !this.matchesVersion(entry, options)) return undefined
		return entry
	}

	getStale(key: string, options: ReadOptions = {}): unknown {
		return this.getStaleEntry(key, options)?.payload
	}

	put(key: string, payload: unknown, options: PutOptions): void {
		const entry: CacheEntry = {
			key,
			payload,
			source: options.source,
			cachedAt: new Date().toISOString(),
			expiresAt: options.expiresAt.toISOString(),
			...(options.schemaVersion !== undefined && { schemaVersion: options.schemaVersion }),
			...(options.meta && { meta: options.meta }),
		}
		this.writeAtomic(this.pathFor(key), JSON.stringify(entry))
		this.log.debug({ key, source: options.source, expiresAt: entry.expiresAt }, 'cache write')
	}

	private writeAtomic(path: string, text: string): void {
		if (!existsSync(this.dir)) mkdirSync(this.dir, { recursive: true })
		const tmp = `${path}.${process.pid}.${Date.now()}.tmp`
		writeFileSync(tmp, text)
		renameSync(tmp, path)
	}

	// ── lookup counters ────────────────────────────────────────────

	private loadCounters(): Counters {
		if (this.counters) return this.counters
		const path = join(this.dir, COUNTERS_FILE)
		let loaded: Counters | undefined
		if (existsSync(path)) {
			try {
				const parsed = countersSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')))
				if (parsed.success) loaded = parsed.data
			} catch (err) {
				this.log.warn({ err }, 'ignoring unreadable lookup counters')
			}
		}
		this.counters = loaded ?? { since: new Date().toISOString(), types: {} }
		return this.counters
	}

	/**
	 * Counts how a cache-first read of `key` was answered. Counters are kept per
	 * data type and persisted beside the entries; a failed write only logs.
	 */
	recordLookup(key: string, outcome: LookupOutcome): void {
		const counters = this.loadCounters()
		const type = keyType(key)
		const counts = counters.types[type] ?? emptyCounts()
		if (outcome === 'fresh_hit') counts.freshHits += 1
		else if (outcome === 'stale_hit') counts.staleHits += 1
		else counts.misses += 1
		counters.types[type] = counts
		try {
			this.writeAtomic(join(this.dir, COUNTERS_FILE), JSON.stringify(counters))
		} catch (err) {
			this.log.warn({ err }, 'could not persist lookup counters')
		}
	}

	resetStats(): void {
		this.counters = { since: new Date().toISOString(), types: {} }
		rmSync(join(this.dir, COUNTERS_FILE), { force: true })
	}

	/** Entry counts, size and age on disk, joined with the lookup counters per data type. */
	stats(): CacheStats {
		const counters = this.loadCounters()
		const byType: Record<string, CacheTypeStats> = {}
		const typeStats = (type: string): CacheTypeStats => {
			let stats = byType[type]
			if (!stats) {
				const counts = counters.types[type] ?? emptyCounts()
				stats = { entries: 0, fresh: 0, expired: 0, ...counts, hitRate: hitRate(counts) }
				byType[type] = stats
			}
			return stats
		}

		let bytes = 0
		let oldestAgeMs: number | null = null
		const entries = this.list()
		for (const entry of entries) {
			const stats = typeStats(keyType(entry.key))
			stats.entries += 1
			if (entry.expired) stats.expired += 1
			else stats.fresh += 1
			oldestAgeMs = oldestAgeMs === null ? entry.ageMs : Math.max(oldestAgeMs, entry.ageMs)
			bytes += statSync(this.pathFor(entry.key)).size
		}
		for (const type of Object.keys(counters.types)) typeStats(type)

		const expired = entries.filter((e) => e.expired).length
		return {
			dir: this.dir,
			entries: entries.length,
			fresh: entries.length - expired,
			expired,
			bytes,
			oldestAgeMs,
			countingSince: Object.keys(counters.types).length > 0 ? counters.since : null,
			byType,
		}
	}

	info(key: string): CacheEntryInfo | undefined {
		const entry = this.read(key)
		return entry && this.describe(entry)
	}

	list(): CacheEntryInfo[] {
		if (!existsSync(this.dir)) return []
		const out: CacheEntryInfo[] = []
		for (const file of readdirSync(this.dir).sort()) {
			if (!file.endsWith('.json')) continue
			const entry = this.read(decodeURIComponent(file.slice(0, -'.json'.length)))
			if (entry) out.push(this.describe(entry))
		}
		return out
	}

	/** Removes one key, or every entry when no key is given. */
	clear(key?: string): void {
		if (key) {
			rmSync(this.pathFor(key), { force: true })
			return
		}
		if (!existsSync(this.dir)) return
		for (const file of readdirSync(this.dir)) {
			if (file.endsWith('.json')) rmSync(join(this.dir, file), { force: true })
		}
	}

	private describe(entry: CacheEntry): CacheEntryInfo {
		return {
			key: entry.key,
			source: entry.source,
			cachedAt: entry.cachedAt,
			expiresAt: entry.expiresAt,
			expired: Date.now() >= Date.parse(entry.expiresAt),
			ageMs: Math.max(0, Date.now() - Date.parse(entry.cachedAt)),
			...(entry.schemaVersion !== undefined && { schemaVersion: entry.schemaVersion }),
			...(entry.meta && { meta: entry.meta }),
		}
	}
}

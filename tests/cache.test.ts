import { existsSync, readdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CacheStore, fundamentalsKey, ohlcvKey } from '../src/core/cache.js'
import { tempDir } from './helpers.js'

const NOW = new Date('2024-06-03T14:00:00Z')
const HOUR = 3_600_000

let dir: string
let store: CacheStore

beforeEach(() => {
	vi.useFakeTimers({ toFake: ['Date'] })
	vi.setSystemTime(NOW)
	dir = join(tempDir(), 'cache')
	store = new CacheStore(dir)
})

afterEach(() => {
	vi.useRealTimers()
})

describe('CacheStore: fresh and stale reads', () => {
	it('creates its directory on first write', () => {
		expect(existsSync(dir)).toBe(false)
		store.put('k', { v: 1 }, { source: 'alpha', expiresAt: new Date(NOW.getTime() + HOUR) })
		expect(existsSync(dir)).toBe(true)
	})

	it('returns a payload while it is fresh', () => {
		store.put('k', { v: 1 }, { source: 'alpha', expiresAt: new Date(NOW.getTime() + HOUR) })
		expect(store.getFresh('k')).toEqual({ v: 1 })
		expect(store.getFreshEntry('k')?.source).toBe('alpha')
	})

	it('hides expired entries from fresh reads but not from stale reads', () => {
		store.put('k', { v: 1 }, { source: 'alpha', expiresAt: new Date(NOW.getTime() + HOUR) })
		vi.setSystemTime(new Date(NOW.getTime() + HOUR))
		expect(store.getFresh('k')).toBeUndefined()
		expect(store.getStale('k')).toEqual({ v: 1 })
	})

	it('misses on an unknown key', () => {
		expect(store.getFresh('nope')).toBeUndefined()
		expect(store.getStale('nope')).toBeUndefined()
	})

	it('overwrites on put', () => {
		const expiresAt = new Date(NOW.getTime() + HOUR)
		store.put('k', { v: 1 }, { source: 'alpha', expiresAt })
		store.put('k', { v: 2 }, { source: 'beta', expiresAt })
		expect(store.getFreshEntry('k')).toMatchObject({ payload: { v: 2 }, source: 'beta' })
	})

	it('survives a new store instance over the same directory', () => {
		store.put('k', [1, 2, 3], { source: 'alpha', expiresAt: new Date(NOW.getTime() + HOUR) })
		expect(new CacheStore(dir).getFresh('k')).toEqual([1, 2, 3])
	})

	it('leaves no temp files behind', () => {
		store.put('k', 1, { source: 'alpha', expiresAt: new Date(NOW.getTime() + HOUR) })
		expect(readdirSync(dir)).toEqual([`${encodeURIComponent('k')}.json`])
	})
})

describe('CacheStore: schema versions', () => {
	it('treats a version mismatch as a miss for fresh and stale reads', () => {
		store.put('f', { pe: 10 }, { source: 'alpha', expiresAt: new Date(NOW.getTime() + HOUR), schemaVersion: 2 })
		expect(store.getFresh('f', { schemaVersion: 3 })).toBeUndefined()
		expect(store.getStale('f', { schemaVersion: 3 })).toBeUndefined()
		expect(store.getFresh('f', { schemaVersion: 2 })).toEqual({ pe: 10 })
	})

	it('treats an unversioned entry as a miss when a version is required', () => {
		store.put('f', { pe: 10 }, { source: 'alpha', expiresAt: new Date(NOW.getTime() + HOUR) })
		expect(store.getStale('f', { schemaVersion: 1 })).toBeUndefined()
	})
})

describe('CacheStore: housekeeping', () => {
	it('describes entries without their payload', () => {
		store.put(ohlcvKey('AAPL'), { bars: [] }, {
			source: 'twelvedata',
			expiresAt: new Date(NOW.getTime() + HOUR),
			meta: { period: '2y', rows: 0 },
		})
		expect(store.info(ohlcvKey('AAPL'))).toEqual({
			key: 'ohlcv:AAPL',
			source: 'twelvedata',
			cachedAt: '2024-06-03T14:00:00.000Z',
			expiresAt: '2024-06-03T15:00:00.000Z',
			expired: false,
			ageMs: 0,
			meta: { period: '2y', rows: 0 },
		})
		vi.setSystemTime(new Date(NOW.getTime() + HOUR))
		expect(store.info(ohlcvKey('AAPL'))?.ageMs).toBe(HOUR)
	})

	it('lists entries sorted by file name and flags expired ones', () => {
		store.put(ohlcvKey('MSFT'), 1, { source: 'alpha', expiresAt: new Date(NOW.getTime() - 1) })
		store.put(fundamentalsKey('AAPL'), 2, { source: 'beta', expiresAt: new Date(NOW.getTime() + HOUR), schemaVersion: 3 })
		const entries = store.list()
		expect(entries.map((e) => [e.key, e.expired])).toEqual([
			['fundamentals:AAPL', false],
			['ohlcv:MSFT', true],
		])
		expect(entries[0].schemaVersion).toBe(3)
	})

	it('clears one key or everything', () => {
		const expiresAt = new Date(NOW.getTime() + HOUR)
		store.put('a', 1, { source: 's', expiresAt })
		store.put('b', 2, { source: 's', expiresAt })
		store.clear('a')
		expect(store.list().map((e) => e.key)).toEqual(['b'])
		store.clear()
		expect(store.list()).toEqual([])
	})

	it('ignores unreadable or foreign files', () => {
		store.put('good', 1, { source: 's', expiresAt: new Date(NOW.getTime() + HOUR) })
		writeFileSync(join(dir, 'broken.json'), '{not json')
		writeFileSync(join(dir, 'other.json'), JSON.stringify({ hello: 'world' }))
		expect(store.getStale('broken')).toBeUndefined()
		expect(store.getStale('other')).toBeUndefined()
		expect(store.list().map((e) => e.key)).toEqual(['good'])
	})
})

describe('CacheStore: lookup stats', () => {
	function populate(): void {
		store.recordLookup(ohlcvKey('AAPL'), 'miss')
		store.put(ohlcvKey('AAPL'), 1, { source: 'alpha', expiresAt: new Date(NOW.getTime() + 2 * HOUR) })
		for (let i = 0; i < 3; i++) store.recordLookup(ohlcvKey('AAPL'), 'fresh_hit')
		store.put(fundamentalsKey('AAPL'), 2, { source: 'beta', expiresAt: new Date(NOW.getTime() - 1) })
		store.recordLookup(fundamentalsKey('AAPL'), 'stale_hit')
	}

	it('counts lookups per data type and joins them with what is on disk', () => {
		populate()
		vi.setSystemTime(new Date(NOW.getTime() + HOUR))

		const stats = store.stats()

		expect(stats).toMatchObject({
			dir,
			entries: 2,
			fresh: 1,
			expired: 1,
			oldestAgeMs: HOUR,
			countingSince: '2024-06-03T14:00:00.000Z',
		})
		expect(stats.bytes).toBeGreaterThan(0)
		expect(stats.byType).toEqual({
			ohlcv: { entries: 1, fresh: 1, expired: 0, freshHits: 3, staleHits: 0, misses: 1, hitRate: 0.75 },
			fundamentals: { entries: 1, fresh: 0, expired: 1, freshHits: 0, staleHits: 1, misses: 0, hitRate: null },
		})
	})

	it('persists counters without listing them as an entry', () => {
		populate()
		const reopened = new CacheStore(dir)
		expect(reopened.stats().byType.ohlcv.freshHits).toBe(3)
		expect(reopened.list().map((e) => e.key)).toEqual(['fundamentals:AAPL', 'ohlcv:AAPL'])
	})

	it('resets counters but keeps entries', () => {
		populate()
		store.resetStats()
		const stats = new CacheStore(dir).stats()
		expect(stats.countingSince).toBeNull()
		expect(stats.entries).toBe(2)
		expect(stats.byType.ohlcv).toMatchObject({ freshHits: 0, misses: 0, hitRate: null })
	})

	it('reports an empty cache', () => {
		expect(store.stats()).toEqual({
			dir,
			entries: 0,
			fresh: 0,
			expired: 0,
			bytes: 0,
			oldestAgeMs: null,
			countingSince: null,
			byType: {},
		})
	})

	it('keeps counting in memory when the directory cannot be written', () => {
		const blocker = join(tempDir(), 'not-a-dir')
		writeFileSync(blocker, '')
		const blocked = new CacheStore(join(blocker, 'cache'))
		expect(() => blocked.recordLookup(ohlcvKey('AAPL'), 'miss')).not.toThrow()
		expect(blocked.stats().byType.ohlcv.misses).toBe(1)
	})
})

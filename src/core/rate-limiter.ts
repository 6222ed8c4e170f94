import type { RateLimitConfig } from '../providers/types.js'

const DAY_MS = 86_400_000

export interface LimiterStatus {
	tokensAvailable: number
	maxPerMinute: number
	dailyUsed: number
	dailyLimit: number | null
	dailyRemaining: number | null
}

/**
 * Per-source token bucket. One token is minted every `60s / perMinute`,
 * up to `perMinute` tokens; an optional `perDay` cap is counted separately
 * and resets 24h after the previous reset.
 *
 * Every method runs synchronously to completion, so the refill-then-decrement
 * sequence cannot interleave with another caller on the same event loop.
 */
export class TokenBucket {
	readonly maxTokens: number
	readonly dailyLimit: number
	readonly refillIntervalMs: number

	private tokens: number
	private lastRefill: number
	private dailyCount = 0
	private dailyResetAt: number

	constructor(config: RateLimitConfig) {
		this.maxTokens = config.perMinute
		this.dailyLimit = config.perDay ?? 0
		this.refillIntervalMs = 60_000 / config.perMinute
		this.tokens = config.perMinute
		const now = Date.now()
		this.lastRefill = now
		this.dailyResetAt = now
	}

	private refill(now: number): void {
		const minted = Math.floor((now - this.lastRefill) / this.refillIntervalMs)
		if (minted >= 1) {
			this.tokens = Math.min(this.maxTokens, this.tokens + minted)
			// Keep the partial interval so ticks stay on schedule; a full bucket restarts the clock
			this.lastRefill =
				this.tokens === this.maxTokens ? now : this.lastRefill + minted * this.refillIntervalMs
		}
		if (now - this.dailyResetAt >= DAY_MS) {
			this.dailyCount = 0
			this.dailyResetAt = now
		}
	}

	/** Non-blocking. Returns false, with no side effects on the bucket, when the call must not proceed. */
	acquire(): boolean {
		this.refill(Date.now())
		if (this.dailyLimit > 0 && this.dailyCount >= this.dailyLimit) return false
		if (this.tokens < 1) return false
		this.tokens -= 1
		this.dailyCount += 1
		return true
	}

	/** Advisory milliseconds until a token is available; 0 when one is available now. */
	waitTimeMs(): number {
		const now = Date.now()
		this.refill(now)
		if (this.dailyLimit > 0 && this.dailyCount >= this.dailyLimit) {
			return Math.max(0, this.dailyResetAt + DAY_MS - now)
		}
		if (this.tokens >= 1) return 0
		return Math.max(0, this.lastRefill + this.refillIntervalMs - now)
	}

	get remainingDaily(): number | null {
		if (this.dailyLimit === 0) return null
		return Math.max(0, this.dailyLimit - this.dailyCount)
	}

	status(): LimiterStatus {
		this.refill(Date.now())
		return {
			tokensAvailable: this.tokens,
			maxPerMinute: this.maxTokens,
			dailyUsed: this.dailyCount,
			dailyLimit: this.dailyLimit || null,
			dailyRemaining: this.remainingDaily,
		}
	}
}

const FALLBACK_LIMITS: RateLimitConfig = { perMinute: 10 }

/** Owns one bucket per source for the lifetime of an orchestrator. */
export class LimiterRegistry {
	private readonly buckets = new Map<string, TokenBucket>()

	constructor(private readonly overrides: Record<string, RateLimitConfig> = {}) {}

	/** Returns the source's bucket, creating it from `defaults` (or an override) on first use. */
	get(source: string, defaults: RateLimitConfig = FALLBACK_LIMITS): TokenBucket {
		let bucket = this.buckets.get(source)
		if (!bucket) {
			bucket = new TokenBucket(this.overrides[source] ?? defaults)
			this.buckets.set(source, bucket)
		}
		return bucket
	}

	reset(source?: string): void {
		if (source) this.buckets.delete(source)
		else this.buckets.clear()
	}

	status(): Record<string, LimiterStatus> {
		const out: Record<string, LimiterStatus> = {}
		for (const [name, bucket] of this.buckets) out[name] = bucket.status()
		return out
	}
}

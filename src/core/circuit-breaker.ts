import { type BreakerSettings, DEFAULT_BREAKER } from './config.js'
import { type Logger, silentLogger } from './logger.js'

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN'

export interface BreakerStatus {
	state: CircuitState
	consecutiveFailures: number
	consecutiveSuccesses: number
	lastFailureAt: string | null
	failureThreshold: number
	recoveryTimeoutMs: number
}

/**
 * Per-source breaker.
 *
 *   CLOSED    → OPEN       after `failureThreshold` consecutive failures
 *   OPEN      → HALF_OPEN  lazily, on the first check after `recoveryTimeoutMs`
 *   HALF_OPEN → CLOSED     after `successThreshold` consecutive successes
 *   HALF_OPEN → OPEN       on any failure
 *
 * Probes are not serialized: every caller that checks while HALF_OPEN is let through.
 */
export class CircuitBreaker {
	private current: CircuitState = 'CLOSED'
	private failures = 0
	private successes = 0
	private openedAt: number | null = null
	private lastFailureAt: number | null = null
	private readonly log: Logger

	constructor(
		readonly source: string,
		readonly settings: BreakerSettings = DEFAULT_BREAKER,
		logger: Logger = silentLogger,
	) {
		this.log = logger.child({ component: 'circuit-breaker', source })
	}

	get state(): CircuitState {
		if (
			this.current === 'OPEN' &&
			this.openedAt !== null &&
			Date.now() - this.openedAt >= this.settings.recoveryTimeoutMs
		) {
			this.transition('HALF_OPEN')
			this.successes = 0
		}
		return this.current
	}

	allowRequest(): boolean {
		return this.state !== 'OPEN'
	}

	recordSuccess(): void {
		if (this.current === 'HALF_OPEN') {
			this.successes += 1
			if (this.successes >= this.settings.successThreshold) {
				this.transition('CLOSED')
				this.failures = 0
				this.successes = 0
				this.openedAt = null
			}
			return
		}
		this.failures = 0
	}

	recordFailure(): void {
		const now = Date.now()
		this.lastFailureAt = now
		if (this.current === 'HALF_OPEN') {
			this.transition('OPEN')
			this.openedAt = now
			this.successes = 0
			return
		}
		this.failures += 1
		if (this.current === 'CLOSED' && this.failures >= this.settings.failureThreshold) {
			this.transition('OPEN')
			this.openedAt = now
		}
	}

	reset(): void {
		this.current = 'CLOSED'
		this.failures = 0
		this.successes = 0
		this.openedAt = null
		this.lastFailureAt = null
	}

	status(): BreakerStatus {
		const state = this.state
		return {
			state,
			consecutiveFailures: this.failures,
			consecutiveSuccesses: this.successes,
			lastFailureAt: this.lastFailureAt === null ? null : new Date(this.lastFailureAt).toISOString(),
			failureThreshold: this.settings.failureThreshold,
			recoveryTimeoutMs: this.settings.recoveryTimeoutMs,
		}
	}

	private transition(to: CircuitState): void {
		const from = this.current
		if (from === to) return
		this.current = to
		const entry = { from, to, consecutiveFailures: this.failures }
		if (to === 'OPEN') this.log.warn(entry, 'circuit opened, calls blocked')
		else if (to === 'HALF_OPEN') this.log.info(entry, 'circuit half-open, probing recovery')
		else this.log.info(entry, 'circuit closed, calls resumed')
	}
}

export class BreakerRegistry {
	private readonly breakers = new Map<string, CircuitBreaker>()

	constructor(
		private readonly settings: BreakerSettings = DEFAULT_BREAKER,
		private readonly logger: Logger = silentLogger,
	) {}

	get(source: string): CircuitBreaker {
		let breaker = this.breakers.get(source)
		if (!breaker) {
			breaker = new CircuitBreaker(source, this.settings, this.logger)
			this.breakers.set(source, breaker)
		}
		return breaker
	}

	/** Administrative override back to CLOSED, for one source or all of them. */
	reset(source?: string): void {
		if (source) {
			this.breakers.get(source)?.reset()
			return
		}
		for (const breaker of this.breakers.values()) breaker.reset()
	}

	status(): Record<string, BreakerStatus> {
		const out: Record<string, BreakerStatus> = {}
		for (const [name, breaker] of this.breakers) out[name] = breaker.status()
		return out
	}
}

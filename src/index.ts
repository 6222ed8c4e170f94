export type {
	Bar,
	Capability,
	EarningsResult,
	FieldSources,
	Fundamentals,
	FundamentalsField,
	FundamentalsResult,
	GlobalOptions,
	OhlcvResult,
	OutputFormat,
	QuoteResult,
	SecurityInfo,
	SecurityInfoResult,
} from './types.js'
export { CACHE_SOURCE, FUNDAMENTALS_FIELDS, STALE_CACHE_SOURCE, emptyFundamentals } from './types.js'

export type {
	FetchFn,
	IntradayInterval,
	Provider,
	ProviderContext,
	ProviderFactory,
	RateLimitConfig,
} from './providers/types.js'
export { buildProviders, chainFor, defaultProviderFactories } from './providers/registry.js'
export { FUNDAMENTALS_SCHEMA_VERSION } from './providers/field-maps.js'
export { createYahooClient, type YahooClient } from './providers/yahoo-finance.js'

export {
	createOrchestrator,
	DataOrchestrator,
	type OrchestratorOptions,
	type OrchestratorStatus,
	type WarmOutcome,
} from './core/orchestrator.js'
export { downloadOhlcv, type DownloadOptions, type DownloadResult } from './core/download.js'
export {
	AllSourcesExhaustedError,
	AuthenticationError,
	DataNotFoundError,
	type FailureReason,
	InsufficientDataError,
	ProviderError,
	type ProviderErrorKind,
	ProviderUnavailableError,
	RateLimitError,
} from './core/errors.js'
export { type AppConfig, getConfigPath, loadConfig, saveConfig } from './core/config.js'
export { type CacheEntryInfo, type CacheStats, CacheStore } from './core/cache.js'
export { CircuitBreaker, type CircuitState } from './core/circuit-breaker.js'
export { TokenBucket } from './core/rate-limiter.js'
export { createLogger, type Logger } from './core/logger.js'
export * as formatter from './core/formatter.js'

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { IANAZone } from 'luxon'
import { z } from 'zod'

// Load .env from the working directory if present
function loadEnvFile(): void {
	const envPath = resolve(process.cwd(), '.env')
	if (!existsSync(envPath)) return
	const content = readFileSync(envPath, 'utf-8')
	for (const line of content.split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue
		const eqIdx = trimmed.indexOf('=')
		if (eqIdx === -1) continue
		const key = trimmed.slice(0, eqIdx).trim()
		let val = trimmed.slice(eqIdx + 1).trim()
		if (
			(val.startsWith('"') && val.endsWith('"')) ||
			(val.startsWith("'") && val.endsWith("'"))
		) {
			val = val.slice(1, -1)
		}
		// Don't override existing env vars
		if (process.env[key] === undefined) {
			process.env[key] = val
		}
	}
}

loadEnvFile()

const rateLimitSchema = z.object({
	perMinute: z.number().int().positive(),
	perDay: z.number().int().nonnegative().optional(),
})

export const configFileSchema = z
	.object({
		twelvedataApiKey: z.string().min(1),
		finnhubApiKey: z.string().min(1),
		fmpApiKey: z.string().min(1),
		cacheDir: z.string().min(1),
		logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
		requestTimeoutMs: z.number().int().positive(),
		disabledSources: z.array(z.string()),
		breaker: z
			.object({
				failureThreshold: z.number().int().positive(),
				recoveryTimeoutMs: z.number().int().nonnegative(),
				successThreshold: z.number().int().positive(),
			})
			.partial(),
		rateLimits: z.record(z.string(), rateLimitSchema),
		fundamentalsTtlDays: z.number().positive(),
		ohlcvExpiryBufferMinutes: z.number().nonnegative(),
		market: z
			.object({
				timezone: z.string().refine((zone) => IANAZone.isValidZone(zone), {
					message: 'Unknown IANA timezone',
				}),
				closeHour: z.number().int().min(0).max(23),
				closeMinute: z.number().int().min(0).max(59),
			})
			.partial(),
	})
	.partial()

export type ConfigFile = z.infer<typeof configFileSchema>
export type LogLevel = NonNullable<ConfigFile['logLevel']>
export type RateLimitOverride = z.infer<typeof rateLimitSchema>

export interface BreakerSettings {
	failureThreshold: number
	recoveryTimeoutMs: number
	successThreshold: number
}

export interface MarketSettings {
	timezone: string
	closeHour: number
	closeMinute: number
}

export interface AppConfig {
	twelvedataApiKey?: string
	finnhubApiKey?: string
	fmpApiKey?: string
	cacheDir: string
	logLevel: LogLevel
	requestTimeoutMs: number
	disabledSources: string[]
	breaker: BreakerSettings
	rateLimits: Record<string, RateLimitOverride>
	fundamentalsTtlDays: number
	ohlcvExpiryBufferMinutes: number
	market: MarketSettings
}

export const DEFAULT_BREAKER: BreakerSettings = {
	failureThreshold: 3,
	recoveryTimeoutMs: 300_000,
	successThreshold: 2,
}

export const DEFAULT_MARKET: MarketSettings = {
	timezone: 'America/New_York',
	closeHour: 16,
	closeMinute: 0,
}

function configDir(): string {
	return process.env.SMD_CONFIG_DIR ?? join(homedir(), '.swing-market-data')
}

export function getConfigPath(): string {
	return join(configDir(), 'config.json')
}

export function defaultConfig(): AppConfig {
	return {
		cacheDir: join(configDir(), 'cache'),
		logLevel: 'info',
		requestTimeoutMs: 15_000,
		disabledSources: [],
		breaker: { ...DEFAULT_BREAKER },
		rateLimits: {},
		fundamentalsTtlDays: 7,
		ohlcvExpiryBufferMinutes: 30,
		market: { ...DEFAULT_MARKET },
	}
}

/** Parses a config file body. Throws with the offending keys when it does not validate. */
export function parseConfigFile(raw: string): ConfigFile {
	const result = configFileSchema.safeParse(JSON.parse(raw))
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
		throw new Error(`Invalid config file: ${issues.join('; ')}`)
	}
	return result.data
}

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
	return LOG_LEVELS.find((l) => l === raw)
}

function readConfigFile(path: string): { file: ConfigFile; problem?: string } {
	if (!existsSync(path)) return { file: {} }
	try {
		return { file: parseConfigFile(readFileSync(path, 'utf-8')) }
	} catch (err) {
		return { file: {}, problem: err instanceof Error ? err.message : String(err) }
	}
}

let cached: AppConfig | null = null
let fileProblem: string | undefined

export function mergeConfig(base: AppConfig, file: ConfigFile): AppConfig {
	return {
		...base,
		...file,
		breaker: { ...base.breaker, ...file.breaker },
		market: { ...base.market, ...file.market },
		rateLimits: { ...base.rateLimits, ...file.rateLimits },
		disabledSources: file.disabledSources ?? base.disabledSources,
	}
}

export function loadConfig(): AppConfig {
	if (cached) return cached

	const { file, problem } = readConfigFile(getConfigPath())
	fileProblem = problem

	const merged = mergeConfig(defaultConfig(), file)

	// Env vars override file
	cached = {
		...merged,
		...(process.env.TWELVEDATA_API_KEY && { twelvedataApiKey: process.env.TWELVEDATA_API_KEY }),
		...(process.env.FINNHUB_API_KEY && { finnhubApiKey: process.env.FINNHUB_API_KEY }),
		...(process.env.FMP_API_KEY && { fmpApiKey: process.env.FMP_API_KEY }),
		...(process.env.SMD_CACHE_DIR && { cacheDir: process.env.SMD_CACHE_DIR }),
	}
	const level = parseLogLevel(process.env.SMD_LOG_LEVEL)
	if (level) cached.logLevel = level

	return cached
}

/** Problem found in the config file during the last load, if any. */
export function getConfigProblem(): string | undefined {
	return fileProblem
}

export function saveConfig(config: ConfigFile): void {
	const { file } = readConfigFile(getConfigPath())
	const merged = configFileSchema.parse({ ...file, ...config })

	const dir = configDir()
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
	writeFileSync(getConfigPath(), JSON.stringify(merged, null, 2), { mode: 0o600 })
	cached = null
}

export function resetConfigCache(): void {
	cached = null
	fileProblem = undefined
}

import type { Capability } from '../types.js'
import { finnhub } from './finnhub.js'
import { fmp } from './fmp.js'
import { stooq } from './stooq.js'
import { twelvedata } from './twelvedata.js'
import type { Provider, ProviderContext, ProviderFactory } from './types.js'
import { yahoo } from './yahoo-finance.js'

export const defaultProviderFactories: ProviderFactory[] = [
	twelvedata,
	finnhub,
	fmp,
	(ctx) => yahoo(ctx),
	stooq,
]

/**
 * Instantiates every adapter against the shared context. Sources listed in
 * `disabledSources` are left out entirely; keyless sources stay in so that
 * their absence shows up as an authentication failure in the chain.
 */
export function buildProviders(
	ctx: ProviderContext,
	factories: ProviderFactory[] = defaultProviderFactories,
): Provider[] {
	const disabled = new Set(ctx.config.disabledSources)
	const providers: Provider[] = []
	for (const factory of factories) {
		const provider = factory(ctx)
		if (disabled.has(provider.name)) {
			ctx.logger.debug({ source: provider.name }, 'source disabled in config')
			continue
		}
		// Prevent duplicate registration
		if (providers.some((p) => p.name === provider.name)) continue
		providers.push(provider)
	}
	return providers
}

/** Adapters offering `capability`, lowest priority number first. */
export function chainFor(providers: Provider[], capability: Capability): Provider[] {
	return providers
		.filter((p) => p.capabilities.includes(capability))
		.sort((a, b) => (a.priority[capability] ?? 99) - (b.priority[capability] ?? 99))
}

export interface ProviderDescription {
	name: string
	requiresKey: boolean
	keyEnvVar?: string
	configured: boolean
	capabilities: Capability[]
}

export function describeProvider(p: Provider): ProviderDescription {
	return {
		name: p.name,
		requiresKey: p.requiresKey,
		...(p.keyEnvVar && { keyEnvVar: p.keyEnvVar }),
		configured: p.isEnabled(),
		capabilities: [...p.capabilities],
	}
}

/**
 * Provider factory: the only place that maps a backend name to its adapter.
 */

import {
  PROVIDER_CREDENTIALS,
  PROVIDER_NAMES,
  isProviderName,
  type Config,
  type ProviderName,
} from '../core/config.js'
import { ProviderRouter, type AIProvider } from '../core/ai-provider.js'
import { NoProviderEnabledError } from '../core/errors.js'
import type { ProviderDeps, ProviderSettings } from './types.js'
import { OpenAIProvider } from './openai/openai-provider.js'
import { AnthropicProvider } from './anthropic/anthropic-provider.js'
import { OllamaProvider } from './ollama/ollama-provider.js'
import { OpenRouterProvider } from './openrouter/openrouter-provider.js'
import { OpenCodeProvider } from './opencode/opencode-provider.js'

export { PROVIDER_NAMES }

/** Resolve one backend's settings from the config and credential lookup. */
export function resolveSettings(config: Config, name: ProviderName): ProviderSettings {
  const provider = config.providers[name]
  const credential = PROVIDER_CREDENTIALS[name]

  const baseURL = name === 'ollama'
    ? provider.baseURL ?? config.credentials.OLLAMA_BASE_URL
    : provider.baseURL

  return {
    enabled: provider.enabled,
    model: provider.defaultModel,
    apiKey: credential ? config.credentials[credential] : undefined,
    baseURL,
  }
}

/** Construct the adapter for `name`. Throws on an unknown name. */
export function createProvider(config: Config, name: string, deps: ProviderDeps = {}): AIProvider {
  if (!isProviderName(name)) {
    throw new Error(`unknown provider type: ${name}`)
  }

  const settings = resolveSettings(config, name)
  switch (name) {
    case 'openai':
      return new OpenAIProvider(settings, deps)
    case 'anthropic':
      return new AnthropicProvider(settings, deps)
    case 'ollama':
      return new OllamaProvider(settings, deps)
    case 'openrouter':
      return new OpenRouterProvider({ ...settings, siteUrl: config.providers.openrouter.siteUrl }, deps)
    case 'opencode':
      return new OpenCodeProvider(settings, deps)
  }
}

/**
 * Build the router from every provider the config enables, in declaration
 * order. The first one becomes the default.
 */
export function buildRouter(config: Config, deps: ProviderDeps = {}): ProviderRouter {
  const providers: AIProvider[] = []
  for (const name of PROVIDER_NAMES) {
    if (!config.providers[name].enabled) continue
    providers.push(createProvider(config, name, deps))
  }

  if (providers.length === 0) {
    throw new NoProviderEnabledError()
  }
  return new ProviderRouter(providers, 0)
}

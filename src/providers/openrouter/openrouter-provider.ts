import { OpenAICompatibleProvider } from '../openai-compatible/openai-compatible-provider.js'
import type { ProviderDeps, ProviderSettings } from '../types.js'

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'
export const OPENROUTER_APP_TITLE = 'Palaver'

export interface OpenRouterSettings extends ProviderSettings {
  /** Optional app URL for OpenRouter's attribution (HTTP-Referer). */
  siteUrl?: string
}

export class OpenRouterProvider extends OpenAICompatibleProvider {
  constructor(settings: OpenRouterSettings, deps: ProviderDeps = {}) {
    const headers: Record<string, string> = { 'X-Title': OPENROUTER_APP_TITLE }
    if (settings.siteUrl) headers['HTTP-Referer'] = settings.siteUrl

    super({
      name: 'openrouter',
      settings,
      defaultBaseURL: OPENROUTER_BASE_URL,
      requiresApiKey: true,
      defaultHeaders: headers,
    }, deps)
  }
}

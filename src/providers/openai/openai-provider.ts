import { OpenAICompatibleProvider } from '../openai-compatible/openai-compatible-provider.js'
import type { ProviderDeps, ProviderSettings } from '../types.js'

export const OPENAI_BASE_URL = 'https://api.openai.com/v1'

export class OpenAIProvider extends OpenAICompatibleProvider {
  constructor(settings: ProviderSettings, deps: ProviderDeps = {}) {
    super({ name: 'openai', settings, defaultBaseURL: OPENAI_BASE_URL, requiresApiKey: true }, deps)
  }
}

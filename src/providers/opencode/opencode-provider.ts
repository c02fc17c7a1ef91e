import { OpenAICompatibleProvider } from '../openai-compatible/openai-compatible-provider.js'
import type { ProviderDeps, ProviderSettings } from '../types.js'

export const OPENCODE_BASE_URL = 'https://opencode.ai/zen/v1'

export class OpenCodeProvider extends OpenAICompatibleProvider {
  constructor(settings: ProviderSettings, deps: ProviderDeps = {}) {
    super({ name: 'opencode', settings, defaultBaseURL: OPENCODE_BASE_URL, requiresApiKey: true }, deps)
  }
}

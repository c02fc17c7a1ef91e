/**
 * OllamaProvider: local inference server speaking the OpenAI protocol.
 *
 * No credential is configured. The client still sends a bearer token, so a
 * fixed placeholder goes out; Ollama ignores it.
 */

import { OpenAICompatibleProvider } from '../openai-compatible/openai-compatible-provider.js'
import type { ProviderDeps, ProviderSettings } from '../types.js'

export const OLLAMA_BASE_URL = 'http://localhost:11434/v1'
export const OLLAMA_PLACEHOLDER_KEY = 'ollama'

export class OllamaProvider extends OpenAICompatibleProvider {
  constructor(settings: Omit<ProviderSettings, 'apiKey'>, deps: ProviderDeps = {}) {
    super({
      name: 'ollama',
      settings: { ...settings, apiKey: OLLAMA_PLACEHOLDER_KEY },
      defaultBaseURL: OLLAMA_BASE_URL,
      requiresApiKey: false,
    }, deps)
  }
}

/**
 * OpenAICompatibleProvider: AIProvider over any Chat Completions endpoint.
 *
 * The OpenAI, Ollama, OpenRouter and OpenCode adapters differ only in name,
 * base URL, headers and whether an API key is mandatory; they all extend
 * this class.
 */

import OpenAI from 'openai'
import type { AIProvider, SendOptions } from '../../core/ai-provider.js'
import type { Message } from '../../core/types.js'
import { ProviderError, abortedError, toProviderError } from '../../core/errors.js'
import type { ProviderDeps, ProviderSettings } from '../types.js'
import { sendChatCompletion } from './chat-completion.js'

export interface OpenAICompatibleOptions {
  name: string
  settings: ProviderSettings
  /** Base URL used when the settings carry none. */
  defaultBaseURL: string
  /** The local server takes any key; hosted backends need a real one. */
  requiresApiKey: boolean
  defaultHeaders?: Record<string, string>
}

export class OpenAICompatibleProvider implements AIProvider {
  readonly name: string
  private readonly model: string
  private readonly client: OpenAI | null

  constructor(opts: OpenAICompatibleOptions, deps: ProviderDeps = {}) {
    const { settings } = opts
    const apiKey = settings.apiKey?.trim() ?? ''

    this.name = opts.name
    this.model = settings.model.trim()

    const usable = settings.enabled
      && this.model !== ''
      && (!opts.requiresApiKey || apiKey !== '')

    this.client = usable
      ? new OpenAI({
          apiKey,
          baseURL: settings.baseURL || opts.defaultBaseURL,
          defaultHeaders: opts.defaultHeaders,
          fetch: deps.fetch,
          maxRetries: 0,
        })
      : null
  }

  isEnabled(): boolean {
    return this.client !== null
  }

  async sendMessage(messages: readonly Message[], opts: SendOptions = {}): Promise<string> {
    if (!this.client) {
      throw new ProviderError(this.name, 'disabled', 'provider not enabled')
    }
    const { signal } = opts
    if (signal?.aborted) throw abortedError(this.name, signal)

    try {
      return await sendChatCompletion(this.client, this.model, messages, signal)
    } catch (err) {
      throw toProviderError(this.name, err, signal)
    }
  }
}

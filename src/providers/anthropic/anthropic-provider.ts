/**
 * AnthropicProvider: AIProvider backed by Vercel AI SDK's Anthropic model.
 *
 * Anthropic takes the system prompt as a dedicated field rather than a
 * system-role turn, and requires an explicit output-token cap on every
 * request.
 */

import { createAnthropic } from '@ai-sdk/anthropic'
import { generateText, type LanguageModel, type ModelMessage } from 'ai'
import type { AIProvider, SendOptions } from '../../core/ai-provider.js'
import { normalizeRole, type Message } from '../../core/types.js'
import { ProviderError, abortedError, toProviderError } from '../../core/errors.js'
import type { ProviderDeps, ProviderSettings } from '../types.js'

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1'
export const ANTHROPIC_MAX_OUTPUT_TOKENS = 1024

export interface AnthropicDeps extends ProviderDeps {
  /** Use this model instead of building one from the settings (tests). */
  languageModel?: LanguageModel
}

export interface AnthropicConversation {
  system: string | undefined
  messages: ModelMessage[]
}

/** Pull system turns out into one system prompt; everything else stays a turn. */
export function splitConversation(messages: readonly Message[]): AnthropicConversation {
  const system: string[] = []
  const turns: ModelMessage[] = []

  for (const m of messages) {
    const role = normalizeRole(m.role)
    if (role === 'system') {
      system.push(m.content)
    } else if (role === 'assistant') {
      turns.push({ role: 'assistant', content: m.content })
    } else {
      turns.push({ role: 'user', content: m.content })
    }
  }

  return {
    system: system.length > 0 ? system.join('\n\n') : undefined,
    messages: turns,
  }
}

export class AnthropicProvider implements AIProvider {
  readonly name = 'anthropic'
  private readonly model: LanguageModel | null

  constructor(settings: ProviderSettings, deps: AnthropicDeps = {}) {
    const modelId = settings.model.trim()
    const apiKey = settings.apiKey?.trim() ?? ''
    const usable = settings.enabled && modelId !== '' && apiKey !== ''

    if (!usable) {
      this.model = null
    } else if (deps.languageModel) {
      this.model = deps.languageModel
    } else {
      const anthropic = createAnthropic({
        apiKey,
        baseURL: settings.baseURL || ANTHROPIC_BASE_URL,
        fetch: deps.fetch,
      })
      this.model = anthropic(modelId)
    }
  }

  isEnabled(): boolean {
    return this.model !== null
  }

  async sendMessage(messages: readonly Message[], opts: SendOptions = {}): Promise<string> {
    if (!this.model) {
      throw new ProviderError(this.name, 'disabled', 'provider not enabled')
    }
    const { signal } = opts
    if (signal?.aborted) throw abortedError(this.name, signal)

    const conversation = splitConversation(messages)
    try {
      const result = await generateText({
        model: this.model,
        system: conversation.system,
        messages: conversation.messages,
        maxOutputTokens: ANTHROPIC_MAX_OUTPUT_TOKENS,
        maxRetries: 0,
        abortSignal: signal,
      })
      return result.text
    } catch (err) {
      throw toProviderError(this.name, err, signal)
    }
  }
}

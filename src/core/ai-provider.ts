/**
 * AIProvider: unified abstraction over LLM backends.
 *
 * Each backend (OpenAI, Anthropic, Ollama, OpenRouter, OpenCode) implements
 * this interface with its own request translation. ProviderRouter holds the
 * enabled providers and picks which one answers a conversation turn.
 */

import { NoProviderEnabledError } from './errors.js'
import type { Message } from './types.js'

// ==================== Types ====================

export interface SendOptions {
  /** Aborts the in-flight request. A timeout signal yields a `timeout` error. */
  signal?: AbortSignal
}

/** One backend adapter. Immutable once constructed; safe to share across calls. */
export interface AIProvider {
  /** Stable lowercase identifier, e.g. `openai`. */
  readonly name: string
  /** Configured as enabled AND has the model and credential it needs. */
  isEnabled(): boolean
  /**
   * Send the whole conversation, resolve with the reply text (possibly empty).
   * Rejects with a ProviderError naming this provider.
   */
  sendMessage(messages: readonly Message[], opts?: SendOptions): Promise<string>
}

export interface ProviderStatus {
  name: string
  enabled: boolean
  isDefault: boolean
}

// ==================== Router ====================

/** Selects the provider for each turn: the default if usable, else the first usable one. */
export class ProviderRouter {
  private readonly providers: readonly AIProvider[]

  constructor(
    providers: readonly AIProvider[],
    private readonly defaultIndex: number | null,
  ) {
    this.providers = [...providers]
  }

  getProvider(): AIProvider {
    if (this.defaultIndex !== null) {
      const preferred = this.providers[this.defaultIndex]
      if (preferred?.isEnabled()) return preferred
    }

    const fallback = this.providers.find((p) => p.isEnabled())
    if (fallback) return fallback

    throw new NoProviderEnabledError()
  }

  async sendMessage(messages: readonly Message[], opts?: SendOptions): Promise<string> {
    const provider = this.getProvider()
    return provider.sendMessage(messages, opts)
  }

  /** Every held provider in declaration order (for status display). */
  list(): ProviderStatus[] {
    return this.providers.map((p, i) => ({
      name: p.name,
      enabled: p.isEnabled(),
      isDefault: i === this.defaultIndex,
    }))
  }
}

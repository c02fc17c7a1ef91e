import { describe, it, expect } from 'vitest'
import { MockLanguageModelV3 } from 'ai/test'
import { ProviderError } from '../../core/errors.js'
import type { Message } from '../../core/types.js'
import type { ProviderSettings } from '../types.js'
import { AnthropicProvider, splitConversation } from './anthropic-provider.js'

// ==================== Helpers ====================

function makeDoGenerate(texts: string[] = ['mock response']) {
  return {
    content: texts.map((text) => ({ type: 'text' as const, text })),
    finishReason: { unified: 'stop' as const, raw: 'stop' },
    usage: {
      inputTokens: { total: 10, noCache: 10, cacheRead: undefined, cacheWrite: undefined },
      outputTokens: { total: 5, text: 5, reasoning: undefined },
    },
    warnings: [],
  }
}

const settings: ProviderSettings = { enabled: true, model: 'claude-test', apiKey: 'test-key' }

const conversation: Message[] = [
  { role: 'system', content: 'be brief' },
  { role: 'user', content: 'hi' },
  { role: 'assistant', content: 'hello' },
  { role: 'system', content: 'answer in English' },
  { role: 'user', content: 'how are you?' },
]

// ==================== splitConversation ====================

describe('splitConversation', () => {
  it('joins system turns into one prompt and keeps the rest in order', () => {
    expect(splitConversation(conversation)).toEqual({
      system: 'be brief\n\nanswer in English',
      messages: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello' },
        { role: 'user', content: 'how are you?' },
      ],
    })
  })

  it('leaves the system prompt unset when there is none', () => {
    expect(splitConversation([{ role: 'user', content: 'hi' }]).system).toBeUndefined()
  })

  it('treats unknown roles as user', () => {
    const stray: Message = JSON.parse('{"role":"function","content":"x"}')
    expect(splitConversation([stray]).messages).toEqual([{ role: 'user', content: 'x' }])
  })
})

// ==================== AnthropicProvider ====================

describe('AnthropicProvider', () => {
  it('concatenates the text blocks of the reply', async () => {
    const model = new MockLanguageModelV3({ doGenerate: makeDoGenerate(['Hel', 'lo']) })
    const provider = new AnthropicProvider(settings, { languageModel: model })

    await expect(provider.sendMessage(conversation)).resolves.toBe('Hello')
  })

  it('sends the system prompt separately and caps output tokens', async () => {
    const model = new MockLanguageModelV3({ doGenerate: makeDoGenerate() })
    await new AnthropicProvider(settings, { languageModel: model }).sendMessage(conversation)

    expect(model.doGenerateCalls).toHaveLength(1)
    const call = model.doGenerateCalls[0]
    expect(call.maxOutputTokens).toBe(1024)
    expect(call.prompt.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user'])
    expect(call.prompt[0]).toMatchObject({ role: 'system', content: 'be brief\n\nanswer in English' })
  })

  it('returns an empty string for an empty reply', async () => {
    const model = new MockLanguageModelV3({ doGenerate: makeDoGenerate([]) })
    await expect(new AnthropicProvider(settings, { languageModel: model }).sendMessage(conversation)).resolves.toBe('')
  })

  it('wraps a backend failure with the provider name', async () => {
    const model = new MockLanguageModelV3({
      doGenerate: async () => {
        throw new Error('overloaded')
      },
    })
    const err = await new AnthropicProvider(settings, { languageModel: model })
      .sendMessage(conversation)
      .catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ProviderError)
    expect(err).toMatchObject({ kind: 'api', provider: 'anthropic', message: 'anthropic: overloaded' })
  })

  it('reports a cancellation without calling the model when the signal already fired', async () => {
    const model = new MockLanguageModelV3({ doGenerate: makeDoGenerate() })
    const controller = new AbortController()
    controller.abort()

    await expect(
      new AnthropicProvider(settings, { languageModel: model }).sendMessage(conversation, { signal: controller.signal }),
    ).rejects.toMatchObject({ kind: 'cancelled', message: 'anthropic: request cancelled' })
    expect(model.doGenerateCalls).toHaveLength(0)
  })

  it('is disabled without an API key or model', async () => {
    const model = new MockLanguageModelV3({ doGenerate: makeDoGenerate() })

    expect(new AnthropicProvider({ ...settings, apiKey: undefined }, { languageModel: model }).isEnabled()).toBe(false)
    expect(new AnthropicProvider({ ...settings, model: ' ' }, { languageModel: model }).isEnabled()).toBe(false)

    const disabled = new AnthropicProvider({ ...settings, enabled: false }, { languageModel: model })
    expect(disabled.isEnabled()).toBe(false)
    await expect(disabled.sendMessage(conversation)).rejects.toMatchObject({
      kind: 'disabled',
      message: 'anthropic: provider not enabled',
    })
    expect(model.doGenerateCalls).toHaveLength(0)
  })

  it('builds a real model when none is injected', () => {
    const provider = new AnthropicProvider(settings)
    expect(provider.name).toBe('anthropic')
    expect(provider.isEnabled()).toBe(true)
  })
})

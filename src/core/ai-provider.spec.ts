import { describe, it, expect, vi } from 'vitest'
import { ProviderRouter, type AIProvider, type SendOptions } from './ai-provider.js'
import { NoProviderEnabledError, ProviderError } from './errors.js'
import type { Message } from './types.js'

// ==================== Fake provider ====================

class FakeProvider implements AIProvider {
  enabled = true
  readonly sendMessage = vi.fn(async (_messages: readonly Message[], _opts?: SendOptions) => `${this.name} reply`)

  constructor(readonly name: string) {}

  isEnabled(): boolean {
    return this.enabled
  }
}

const conversation: Message[] = [
  { role: 'system', content: 'be brief' },
  { role: 'user', content: 'hi' },
]

describe('ProviderRouter', () => {
  // -------------------- getProvider --------------------

  describe('getProvider()', () => {
    it('returns the default while it is enabled', () => {
      const a = new FakeProvider('a')
      const b = new FakeProvider('b')
      const router = new ProviderRouter([a, b], 1)
      expect(router.getProvider()).toBe(b)
    })

    it('falls back to the first enabled provider in declaration order', () => {
      const a = new FakeProvider('a')
      const b = new FakeProvider('b')
      const c = new FakeProvider('c')
      const router = new ProviderRouter([a, b, c], 0)

      a.enabled = false
      expect(router.getProvider()).toBe(b)
    })

    it('scans from the start, not from the default', () => {
      const a = new FakeProvider('a')
      const b = new FakeProvider('b')
      const c = new FakeProvider('c')
      const router = new ProviderRouter([a, b, c], 1)

      b.enabled = false
      expect(router.getProvider()).toBe(a)
    })

    it('uses the first enabled provider when no default is set', () => {
      const a = new FakeProvider('a')
      const b = new FakeProvider('b')
      a.enabled = false
      expect(new ProviderRouter([a, b], null).getProvider()).toBe(b)
    })

    it('throws the sentinel when nothing is enabled', () => {
      const a = new FakeProvider('a')
      a.enabled = false
      const router = new ProviderRouter([a], 0)

      expect(() => router.getProvider()).toThrow(NoProviderEnabledError)
      expect(() => router.getProvider()).toThrow('no LLM provider enabled')
    })
  })

  // -------------------- sendMessage --------------------

  describe('sendMessage()', () => {
    it('delegates to the selected provider', async () => {
      const a = new FakeProvider('a')
      const router = new ProviderRouter([a], 0)
      const signal = new AbortController().signal

      await expect(router.sendMessage(conversation, { signal })).resolves.toBe('a reply')
      expect(a.sendMessage).toHaveBeenCalledWith(conversation, { signal })
    })

    it('propagates the provider error verbatim, without trying another provider', async () => {
      const a = new FakeProvider('a')
      const b = new FakeProvider('b')
      const failure = new ProviderError('a', 'api', '500 upstream down')
      a.sendMessage.mockRejectedValueOnce(failure)

      const router = new ProviderRouter([a, b], 0)
      await expect(router.sendMessage(conversation)).rejects.toBe(failure)
      expect(b.sendMessage).not.toHaveBeenCalled()
    })

    it('rejects with the sentinel when nothing is enabled', async () => {
      const a = new FakeProvider('a')
      a.enabled = false
      const router = new ProviderRouter([a], 0)

      await expect(router.sendMessage(conversation)).rejects.toThrow(NoProviderEnabledError)
      expect(a.sendMessage).not.toHaveBeenCalled()
    })
  })

  // -------------------- list --------------------

  describe('list()', () => {
    it('reports every provider in order with its state', () => {
      const a = new FakeProvider('a')
      const b = new FakeProvider('b')
      b.enabled = false

      expect(new ProviderRouter([a, b], 0).list()).toEqual([
        { name: 'a', enabled: true, isDefault: true },
        { name: 'b', enabled: false, isDefault: false },
      ])
    })
  })
})

import { vi } from 'vitest'
import type { AIProvider, SendOptions } from '../../../core/ai-provider.js'
import { SessionError, abortedError } from '../../../core/errors.js'
import type { Message } from '../../../core/types.js'
import type { HistoryStore } from '../handlers.js'
import type { MessageSender, ParseMode } from '../types.js'

// ── Outgoing messages ──

export interface SentMessage {
  chatId: number
  text: string
  parseMode?: ParseMode
}

export class FakeSender implements MessageSender {
  sent: SentMessage[] = []
  actions: Array<{ chatId: number; action: 'typing' }> = []
  failTyping = false

  async sendMessage(chatId: number, text: string, opts?: { parseMode?: ParseMode }) {
    this.sent.push(opts?.parseMode ? { chatId, text, parseMode: opts.parseMode } : { chatId, text })
    return true
  }

  async sendChatAction(chatId: number, action: 'typing') {
    this.actions.push({ chatId, action })
    if (this.failTyping) throw new Error('chat action rejected')
    return true
  }

  texts(): string[] {
    return this.sent.map((m) => m.text)
  }
}

// ── Providers ──

export class FakeProvider implements AIProvider {
  enabled = true
  readonly sendMessage = vi.fn(async (_messages: readonly Message[], _opts?: SendOptions): Promise<string> => 'fake reply')

  constructor(readonly name: string) {}

  isEnabled(): boolean {
    return this.enabled
  }
}

/** Reply that only settles when the request signal aborts, failing the way real adapters do. */
export function waitForAbort(_messages: readonly Message[], opts?: SendOptions): Promise<string> {
  return new Promise((_resolve, reject) => {
    const signal = opts?.signal
    if (!signal) return
    signal.addEventListener('abort', () => reject(abortedError('fake', signal)))
  })
}

// ── History ──

export class MemoryHistory implements HistoryStore {
  readonly data = new Map<number, Message[]>()
  failGet = false
  failSave = false
  failDelete = false

  async get(userId: number): Promise<Message[]> {
    if (this.failGet) throw new SessionError('parse', 'corrupt file')
    return [...(this.data.get(userId) ?? [])]
  }

  async save(userId: number, messages: readonly Message[]): Promise<void> {
    if (this.failSave) throw new SessionError('write', 'disk full')
    this.data.set(userId, [...messages])
  }

  async delete(userId: number): Promise<void> {
    if (this.failDelete) throw new SessionError('delete', 'permission denied')
    this.data.delete(userId)
  }
}

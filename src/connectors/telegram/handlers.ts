/**
 * ChatHandlers: what the bot does for each command and each text message.
 *
 * Transport-free: replies go through a MessageSender, so the same code runs
 * against grammY's Api and against test fakes.
 */

import type { ProviderRouter } from '../../core/ai-provider.js'
import type { SessionStore } from '../../core/session.js'
import type { Message } from '../../core/types.js'
import { NoProviderEnabledError, ProviderError } from '../../core/errors.js'
import type { MessageSender } from './types.js'
import { splitMessage } from './helpers.js'

// ==================== Texts ====================

export const WELCOME_TEXT = [
  "Welcome to Palaver! I'm here to help you talk to AI models.",
  '',
  'Available commands:',
  '/start - Show this welcome message',
  '/help - Get detailed help',
  '/myid - Get your Telegram ID',
  '/model - Show current model info',
  '/clear - Clear your conversation history',
  '',
  "Just send me a message and I'll respond using the configured AI provider.",
].join('\n')

export const HELP_TEXT = [
  'Available commands:',
  '',
  '/start - Welcome message',
  '/help - Show this help message',
  '/myid - Get your Telegram user ID',
  '/model - Display current active provider and all available providers',
  '/clear - Clear your conversation history',
  '',
  'How it works:',
  "- Send me any message and I'll forward it to the AI",
  '- Your conversation history is preserved between messages',
  '- Use /clear to start a fresh conversation',
].join('\n')

export const NO_PROVIDER_TEXT = 'No LLM provider enabled. Please check configuration.'
export const TIMEOUT_TEXT = 'Request timed out. Please try again.'
export const BACKEND_ERROR_TEXT = 'Error communicating with AI'
export const EMPTY_REPLY_TEXT = 'Empty response from AI'
export const HISTORY_ERROR_TEXT = 'Error loading conversation history'
export const CLEARED_TEXT = 'Conversation history cleared.'

/** User-facing text for a failed turn; `null` means stay silent (deliberate cancel). */
export function describeFailure(err: unknown): string | null {
  if (err instanceof NoProviderEnabledError) return NO_PROVIDER_TEXT
  if (err instanceof ProviderError) {
    if (err.kind === 'cancelled') return null
    if (err.kind === 'timeout') return TIMEOUT_TEXT
  }
  return BACKEND_ERROR_TEXT
}

// ==================== Handlers ====================

export type ConversationRouter = Pick<ProviderRouter, 'getProvider' | 'sendMessage' | 'list'>
export type HistoryStore = Pick<SessionStore, 'get' | 'save' | 'delete'>

export interface ChatHandlersOpts {
  router: ConversationRouter
  sessions: HistoryStore
  sender: MessageSender
  requestTimeoutMs: number
  /** Aborts every in-flight provider call (bot shutdown). */
  shutdownSignal?: AbortSignal
}

export class ChatHandlers {
  private router: ConversationRouter
  private sessions: HistoryStore
  private sender: MessageSender
  private requestTimeoutMs: number
  private shutdownSignal?: AbortSignal

  constructor(opts: ChatHandlersOpts) {
    this.router = opts.router
    this.sessions = opts.sessions
    this.sender = opts.sender
    this.requestTimeoutMs = opts.requestTimeoutMs
    this.shutdownSignal = opts.shutdownSignal
  }

  async start(chatId: number): Promise<void> {
    await this.sender.sendMessage(chatId, WELCOME_TEXT)
  }

  async help(chatId: number): Promise<void> {
    await this.sender.sendMessage(chatId, HELP_TEXT)
  }

  async myId(chatId: number, userId: number): Promise<void> {
    await this.sender.sendMessage(chatId, `Your Telegram ID: \`${userId}\``, { parseMode: 'Markdown' })
  }

  async model(chatId: number): Promise<void> {
    let activeName: string
    try {
      activeName = this.router.getProvider().name
    } catch (err) {
      if (!(err instanceof NoProviderEnabledError)) throw err
      await this.sender.sendMessage(chatId, 'Error: No LLM provider enabled')
      return
    }

    const lines = [`Active provider: ${activeName}`, '', 'Configured providers:']
    for (const p of this.router.list()) {
      const tags = [p.enabled ? 'enabled' : 'disabled']
      if (p.isDefault) tags.push('default')
      lines.push(`- ${p.name} (${tags.join(', ')})`)
    }
    await this.sender.sendMessage(chatId, lines.join('\n'))
  }

  async clear(chatId: number, userId: number): Promise<void> {
    try {
      await this.sessions.delete(userId)
    } catch (err) {
      console.error(`telegram: failed to clear session for user ${userId}:`, err)
      const detail = err instanceof Error ? err.message : String(err)
      await this.sender.sendMessage(chatId, `Error clearing session: ${detail}`)
      return
    }
    await this.sender.sendMessage(chatId, CLEARED_TEXT)
  }

  /** One conversation turn: load history, ask the router, persist, reply. */
  async text(chatId: number, userId: number, text: string): Promise<void> {
    this.sender.sendChatAction(chatId, 'typing').catch((err) => {
      console.warn(`telegram: typing indicator failed for chat ${chatId}:`, err)
    })

    let history: Message[]
    try {
      history = await this.sessions.get(userId)
    } catch (err) {
      console.error(`telegram: failed to load session for user ${userId}:`, err)
      await this.sender.sendMessage(chatId, HISTORY_ERROR_TEXT)
      return
    }

    const conversation: Message[] = [...history, { role: 'user', content: text }]

    let reply: string
    try {
      reply = await this.router.sendMessage(conversation, { signal: this.requestSignal() })
    } catch (err) {
      const notice = describeFailure(err)
      if (notice === null) {
        console.log(`telegram: request for user ${userId} cancelled`)
        return
      }
      console.error(`telegram: LLM request failed for user ${userId}:`, err)
      await this.sender.sendMessage(chatId, notice)
      return
    }

    if (!reply) {
      await this.sender.sendMessage(chatId, EMPTY_REPLY_TEXT)
      return
    }

    try {
      await this.sessions.save(userId, [...conversation, { role: 'assistant', content: reply }])
    } catch (err) {
      console.error(`telegram: failed to save session for user ${userId}:`, err)
    }

    for (const chunk of splitMessage(reply)) {
      await this.sender.sendMessage(chatId, chunk)
    }
  }

  private requestSignal(): AbortSignal {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs)
    return this.shutdownSignal ? AbortSignal.any([timeout, this.shutdownSignal]) : timeout
  }
}

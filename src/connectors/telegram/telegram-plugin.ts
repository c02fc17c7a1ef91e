import { Bot, type Api } from 'grammy'
import { autoRetry } from '@grammyjs/auto-retry'
import type { Plugin, EngineContext } from '../../core/types.js'
import type { TelegramConfig, MessageSender } from './types.js'
import { createAuthGuard } from './auth.js'
import { ChatHandlers } from './handlers.js'
import { maskToken } from './helpers.js'

/** Adapt grammY's Api to the handlers' MessageSender. */
export function apiSender(api: Api): MessageSender {
  return {
    sendMessage: (chatId, text, opts) =>
      api.sendMessage(chatId, text, opts?.parseMode ? { parse_mode: opts.parseMode } : undefined),
    sendChatAction: (chatId, action) => api.sendChatAction(chatId, action),
  }
}

export class TelegramPlugin implements Plugin {
  name = 'telegram'
  private config: TelegramConfig
  private bot: Bot | null = null

  /** Fired on stop() so in-flight LLM calls end as cancellations. */
  private shutdown = new AbortController()

  constructor(
    config: Omit<TelegramConfig, 'pollingTimeout' | 'requestTimeoutMs'>
      & Partial<Pick<TelegramConfig, 'pollingTimeout' | 'requestTimeoutMs'>>,
  ) {
    this.config = { pollingTimeout: 30, requestTimeoutMs: 120_000, ...config }
  }

  async start(engineCtx: EngineContext) {
    const bot = new Bot(this.config.token)

    // Auto-retry on 429 rate limits
    bot.api.config.use(autoRetry())

    // Error handler
    bot.catch((err) => {
      console.error('telegram bot error:', err)
    })

    // ── Middleware: allow-list guard (always active) ──
    bot.use(createAuthGuard(this.config.allowedUsers))

    const handlers = new ChatHandlers({
      router: engineCtx.router,
      sessions: engineCtx.sessions,
      sender: apiSender(bot.api),
      requestTimeoutMs: this.config.requestTimeoutMs,
      shutdownSignal: this.shutdown.signal,
    })

    // ── Commands ──
    bot.command('start', (ctx) => handlers.start(ctx.chat.id))
    bot.command('help', (ctx) => handlers.help(ctx.chat.id))
    bot.command('model', (ctx) => handlers.model(ctx.chat.id))

    bot.command('myid', async (ctx) => {
      const userId = ctx.from?.id
      if (userId === undefined) return
      await handlers.myId(ctx.chat.id, userId)
    })

    bot.command('clear', async (ctx) => {
      const userId = ctx.from?.id
      if (userId === undefined) return
      await handlers.clear(ctx.chat.id, userId)
    })

    // ── Text messages ──
    bot.on('message:text', async (ctx) => {
      const userId = ctx.from?.id
      if (userId === undefined) return
      console.log(`telegram: [${ctx.chat.id}] user ${userId}: ${ctx.message.text.slice(0, 80)}`)
      await handlers.text(ctx.chat.id, userId, ctx.message.text)
    })

    // ── Register commands with Telegram ──
    await bot.api.setMyCommands([
      { command: 'start', description: 'Show the welcome message' },
      { command: 'help', description: 'Get detailed help' },
      { command: 'myid', description: 'Get your Telegram ID' },
      { command: 'model', description: 'Show current model info' },
      { command: 'clear', description: 'Clear your conversation history' },
    ])

    // ── Initialize and get bot info ──
    await bot.init()
    console.log(`telegram plugin: connected as @${bot.botInfo.username} (token ${maskToken(this.config.token)})`)
    console.log(`telegram: allowed users count: ${this.config.allowedUsers.length}`)

    // ── Start polling ──
    this.bot = bot
    bot.start({
      allowed_updates: ['message'],
      timeout: this.config.pollingTimeout,
      onStart: () => console.log('telegram: polling started'),
    }).catch((err) => {
      console.error('telegram polling fatal error:', err)
    })
  }

  async stop() {
    this.shutdown.abort()
    await this.bot?.stop()
  }
}

export interface TelegramConfig {
  token: string
  /** Telegram user IDs allowed to interact. Empty = allow all. */
  allowedUsers: number[]
  /** Polling timeout in seconds (Telegram long-poll parameter). Default: 30 */
  pollingTimeout: number
  /** Upper bound for one LLM round-trip, in ms. Default: 120000 */
  requestTimeoutMs: number
}

export type ParseMode = 'Markdown' | 'MarkdownV2' | 'HTML'

/**
 * The slice of the Bot API the handlers need. Satisfied by grammY's `Api`
 * (see `apiSender`) and by fakes in tests.
 */
export interface MessageSender {
  sendMessage(chatId: number, text: string, opts?: { parseMode?: ParseMode }): Promise<unknown>
  sendChatAction(chatId: number, action: 'typing'): Promise<unknown>
}

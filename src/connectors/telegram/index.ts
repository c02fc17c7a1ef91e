export { TelegramPlugin, apiSender } from './telegram-plugin.js'
export { ChatHandlers } from './handlers.js'
export type { TelegramConfig, MessageSender } from './types.js'

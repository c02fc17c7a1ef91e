import { loadConfig } from './core/config.js'
import type { Plugin, EngineContext } from './core/types.js'
import { SessionStore } from './core/session.js'
import { buildRouter } from './providers/factory.js'
import { TelegramPlugin } from './connectors/telegram/index.js'

async function main() {
  const config = await loadConfig()

  const token = process.env.TELEGRAM_BOT_TOKEN?.trim()
  if (!token) {
    throw new Error('TELEGRAM_BOT_TOKEN is required')
  }

  // ==================== AI Provider Chain ====================

  const router = buildRouter(config)
  for (const p of router.list()) {
    console.log(`router: ${p.name} ${p.enabled ? 'enabled' : 'disabled'}${p.isDefault ? ' (default)' : ''}`)
  }

  // ==================== Sessions ====================

  const sessions = await SessionStore.open(config.memory.path, config.memory.maxMessages)
  console.log(`session: storing up to ${sessions.maxMessages} messages per user in ${sessions.dir}`)

  // ==================== Plugins ====================

  const plugins: Plugin[] = [
    new TelegramPlugin({
      token,
      allowedUsers: config.access.allowedUsers,
      pollingTimeout: config.telegram.pollingTimeout,
      requestTimeoutMs: config.telegram.requestTimeoutMs,
    }),
  ]

  const ctx: EngineContext = { config, router, sessions }

  for (const plugin of plugins) {
    await plugin.start(ctx)
    console.log(`plugin started: ${plugin.name}`)
  }

  // ==================== Shutdown ====================

  const shutdown = async () => {
    console.log('engine: shutting down')
    for (const plugin of plugins) {
      await plugin.stop()
    }
    process.exit(0)
  }
  process.on('SIGINT', () => { shutdown().catch((err) => { console.error('shutdown failed:', err); process.exit(1) }) })
  process.on('SIGTERM', () => { shutdown().catch((err) => { console.error('shutdown failed:', err); process.exit(1) }) })

  console.log('engine: started')
}

main().catch((err) => {
  console.error('fatal:', err)
  process.exit(1)
})

import type { Config } from './config.js'
import type { ProviderRouter } from './ai-provider.js'
import type { SessionStore } from './session.js'

export type { Config }

// ==================== Conversation ====================

export type Role = 'system' | 'user' | 'assistant'

/** One role-tagged turn of a conversation. Sequences are oldest first. */
export interface Message {
  readonly role: Role
  readonly content: string
}

const ROLES: readonly string[] = ['system', 'user', 'assistant']

function isRole(value: string): value is Role {
  return ROLES.includes(value)
}

/** Unknown role strings fall back to `user`. */
export function normalizeRole(value: string): Role {
  return isRole(value) ? value : 'user'
}

// ==================== Plugins ====================

export interface Plugin {
  name: string
  start(ctx: EngineContext): Promise<void>
  stop(): Promise<void>
}

export interface EngineContext {
  config: Config
  router: ProviderRouter
  sessions: SessionStore
}

/**
 * SessionStore: per-user conversation history on disk.
 *
 * Storage: one JSON file per user (`<dir>/<userId>.json`) holding the
 * message array, oldest first. Writes replace the whole file (temp file +
 * rename). A missing file is an empty history.
 *
 * All reads share one RwLock per store; saves and deletes hold it
 * exclusively. There is no cross-process locking: a single process owns the
 * directory.
 */

import { readFile, writeFile, rename, mkdir, unlink, access } from 'node:fs/promises'
import { constants } from 'node:fs'
import { join, resolve } from 'node:path'
import { z } from 'zod'
import { SessionError, type SessionOp } from './errors.js'
import { RwLock } from './rw-lock.js'
import { normalizeRole, type Message } from './types.js'

// ==================== Defaults ====================

export const DEFAULT_SESSION_DIR = './data/sessions'
export const DEFAULT_MAX_MESSAGES = 50

const persistedSchema = z.array(z.object({
  role: z.string(),
  content: z.string(),
}))

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err as NodeJS.ErrnoException).code === 'ENOENT'
}

// ==================== Store ====================

export class SessionStore {
  private readonly lock = new RwLock()

  private constructor(
    readonly dir: string,
    readonly maxMessages: number,
  ) {}

  /**
   * Open (and create if needed) a session directory.
   * Empty `dir` and zero/absent `maxMessages` fall back to the defaults.
   */
  static async open(dir?: string, maxMessages?: number): Promise<SessionStore> {
    const max = maxMessages || DEFAULT_MAX_MESSAGES
    if (!Number.isInteger(max) || max < 1) {
      throw new SessionError('open', `max retained messages must be a positive integer, got ${maxMessages}`)
    }

    const path = resolve(dir || DEFAULT_SESSION_DIR)
    try {
      await mkdir(path, { recursive: true })
      await access(path, constants.W_OK)
    } catch (err) {
      throw SessionError.wrap('open', err, path)
    }
    return new SessionStore(path, max)
  }

  /** Full history for a user; `[]` when none was saved. */
  async get(userId: number): Promise<Message[]> {
    const path = this.pathFor(userId, 'read')
    return this.lock.read(async () => {
      let raw: string
      try {
        raw = await readFile(path, 'utf-8')
      } catch (err) {
        if (isNotFound(err)) return []
        throw SessionError.wrap('read', err, path)
      }

      let data: unknown
      try {
        data = JSON.parse(raw)
      } catch (err) {
        throw SessionError.wrap('parse', err, path)
      }

      const parsed = persistedSchema.safeParse(data)
      if (!parsed.success) {
        throw SessionError.wrap('parse', parsed.error, path)
      }
      return parsed.data.map((m) => ({ role: normalizeRole(m.role), content: m.content }))
    })
  }

  /** Replace a user's history, keeping only the newest `maxMessages` entries. */
  async save(userId: number, messages: readonly Message[]): Promise<void> {
    const path = this.pathFor(userId, 'write')
    const kept = messages.length > this.maxMessages
      ? messages.slice(messages.length - this.maxMessages)
      : messages
    const body = JSON.stringify(kept.map((m) => ({ role: m.role, content: m.content })), null, 2) + '\n'

    await this.lock.write(async () => {
      const tmp = `${path}.${process.pid}.tmp`
      try {
        await writeFile(tmp, body, 'utf-8')
        await rename(tmp, path)
      } catch (err) {
        throw SessionError.wrap('write', err, path)
      }
    })
  }

  /** Remove a user's history. Deleting an absent session succeeds. */
  async delete(userId: number): Promise<void> {
    const path = this.pathFor(userId, 'delete')
    await this.lock.write(async () => {
      try {
        await unlink(path)
      } catch (err) {
        if (isNotFound(err)) return
        throw SessionError.wrap('delete', err, path)
      }
    })
  }

  private pathFor(userId: number, op: SessionOp): string {
    if (!Number.isSafeInteger(userId)) {
      throw new SessionError(op, `invalid user id: ${userId}`)
    }
    return join(this.dir, `${userId}.json`)
  }
}

/**
 * Allow-list guard. Runs before every handler; an empty list means
 * development mode and lets everyone through.
 */

export const ACCESS_DENIED_TEXT = 'Access denied. You are not authorized to use this bot.'

/** What the guard reads from a grammY Context. */
export interface AuthContext {
  from?: { id: number }
  chat?: { id: number }
  reply(text: string): Promise<unknown>
}

export function isAuthorized(allowedUsers: readonly number[], userId: number | undefined): boolean {
  if (allowedUsers.length === 0) return true
  if (userId === undefined) return false
  return allowedUsers.includes(userId)
}

export function createAuthGuard(allowedUsers: readonly number[]) {
  if (allowedUsers.length === 0) {
    console.warn('telegram: development mode, no allowed users configured')
  }

  return async (ctx: AuthContext, next: () => Promise<void>): Promise<void> => {
    const userId = ctx.from?.id
    if (isAuthorized(allowedUsers, userId)) return next()

    if (userId === undefined) {
      console.log('telegram: unauthorized update without sender, dropped')
      return
    }

    console.log(`telegram: unauthorized access attempt from user ${userId}`)
    if (ctx.chat) {
      await ctx.reply(ACCESS_DENIED_TEXT)
    }
  }
}

/**
 * Error taxonomy shared by providers, the router, the session store and the
 * config loader. Callers branch on the class (and `kind` / `op`), never on
 * message text.
 */

// ==================== Providers ====================

export type ProviderErrorKind = 'disabled' | 'api' | 'cancelled' | 'timeout'

/** Any failure of `AIProvider.sendMessage`. Message is always `"<provider>: <cause>"`. */
export class ProviderError extends Error {
  override readonly name = 'ProviderError'

  constructor(
    readonly provider: string,
    readonly kind: ProviderErrorKind,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${provider}: ${detail}`, options)
  }
}

export const NO_PROVIDER_ENABLED = 'no LLM provider enabled'

/** Router has nothing usable. Same text every time, never wrapped. */
export class NoProviderEnabledError extends Error {
  override readonly name = 'NoProviderEnabledError'

  constructor() {
    super(NO_PROVIDER_ENABLED)
  }
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

function isTimeoutReason(reason: unknown): boolean {
  return typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError'
}

/** Error for a call whose signal was already aborted or fired mid-request. */
export function abortedError(provider: string, signal: AbortSignal, cause?: unknown): ProviderError {
  const kind = isTimeoutReason(signal.reason) ? 'timeout' : 'cancelled'
  const detail = kind === 'timeout' ? 'request timed out' : 'request cancelled'
  return new ProviderError(provider, kind, detail, { cause: cause ?? signal.reason })
}

/**
 * Attribute an SDK/network failure to a provider. An aborted caller signal
 * wins over whatever the SDK threw, so cancellation stays distinguishable.
 */
export function toProviderError(provider: string, err: unknown, signal?: AbortSignal): ProviderError {
  if (err instanceof ProviderError) return err
  if (signal?.aborted) return abortedError(provider, signal, err)
  return new ProviderError(provider, 'api', describe(err), { cause: err })
}

// ==================== Sessions ====================

export type SessionOp = 'open' | 'read' | 'parse' | 'write' | 'delete'

export class SessionError extends Error {
  override readonly name = 'SessionError'

  constructor(
    readonly op: SessionOp,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`failed to ${op} session: ${detail}`, options)
  }

  static wrap(op: SessionOp, err: unknown, target?: string): SessionError {
    const where = target ? ` (${target})` : ''
    return new SessionError(op, `${describe(err)}${where}`, { cause: err })
  }
}

// ==================== Config ====================

export class ConfigError extends Error {
  override readonly name = 'ConfigError'

  constructor(
    readonly field: string,
    detail: string,
  ) {
    super(`${field}: ${detail}`)
  }
}

/** Resolved per-backend settings handed to a provider constructor. */
export interface ProviderSettings {
  enabled: boolean
  model: string
  apiKey?: string
  baseURL?: string
}

export interface ProviderDeps {
  /** HTTP transport override (tests pass a fake; production uses global fetch). */
  fetch?: typeof globalThis.fetch
}

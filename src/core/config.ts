import { z } from 'zod'
import { readFile, writeFile, mkdir } from 'fs/promises'
import { resolve } from 'path'
import { ConfigError } from './errors.js'

export const DEFAULT_CONFIG_DIR = resolve('data/config')

// ==================== Provider names ====================

/** Declaration order doubles as the router's construction and fallback order. */
export const PROVIDER_NAMES = ['openai', 'anthropic', 'ollama', 'openrouter', 'opencode'] as const

export type ProviderName = (typeof PROVIDER_NAMES)[number]

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value)
}

// ==================== Individual Schemas ====================

const telegramSchema = z.object({
  /** Long-poll timeout in seconds. */
  pollingTimeout: z.number().int().positive().default(30),
  /** Upper bound for one provider round-trip. */
  requestTimeoutMs: z.number().int().positive().default(120_000),
})

const accessSchema = z.object({
  /** Telegram user IDs allowed to talk to the bot. Empty = allow all. */
  allowedUsers: z.array(z.number().int().positive()).default([]),
})

const providerSchema = z.object({
  enabled: z.boolean().default(false),
  defaultModel: z.string().trim().default(''),
  baseURL: z.string().url().optional(),
})

const providersSchema = z.object({
  openai: providerSchema.default({}),
  anthropic: providerSchema.default({}),
  ollama: providerSchema.default({}),
  openrouter: providerSchema.extend({
    /** Sent as HTTP-Referer for OpenRouter's app attribution. */
    siteUrl: z.string().url().optional(),
  }).default({}),
  opencode: providerSchema.default({}),
})

const memorySchema = z.object({
  path: z.string().default('./data/sessions'),
  maxMessages: z.number().int().min(1).default(50),
})

// ==================== Credentials ====================

export const CREDENTIAL_NAMES = [
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'OPENROUTER_API_KEY',
  'OPENCODE_API_KEY',
  'OLLAMA_BASE_URL',
] as const

export type CredentialName = (typeof CREDENTIAL_NAMES)[number]

export type Credentials = Partial<Record<CredentialName, string>>

/** Pick the recognized secrets out of an environment. Blank values are dropped. */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const credentials: Credentials = {}
  for (const name of CREDENTIAL_NAMES) {
    const value = env[name]?.trim()
    if (value) credentials[name] = value
  }
  return credentials
}

/** API key each provider needs; `null` for the local server. */
export const PROVIDER_CREDENTIALS: Record<ProviderName, CredentialName | null> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  ollama: null,
  openrouter: 'OPENROUTER_API_KEY',
  opencode: 'OPENCODE_API_KEY',
}

// ==================== Unified Config Type ====================

export type ProviderConfig = z.infer<typeof providerSchema>

export type Config = {
  telegram: z.infer<typeof telegramSchema>
  access: z.infer<typeof accessSchema>
  providers: z.infer<typeof providersSchema>
  memory: z.infer<typeof memorySchema>
  credentials: Credentials
}

// ==================== Loader ====================

export interface ConfigSections {
  telegram?: z.input<typeof telegramSchema>
  access?: z.input<typeof accessSchema>
  providers?: z.input<typeof providersSchema>
  memory?: z.input<typeof memorySchema>
}

/** Build a Config from in-memory sections (defaults filled, no cross-field validation). */
export function configFromSections(sections: ConfigSections = {}, credentials: Credentials = {}): Config {
  return {
    telegram: telegramSchema.parse(sections.telegram ?? {}),
    access: accessSchema.parse(sections.access ?? {}),
    providers: providersSchema.parse(sections.providers ?? {}),
    memory: memorySchema.parse(sections.memory ?? {}),
    credentials,
  }
}

/** Read a JSON config file. Returns undefined if file does not exist. */
async function loadJsonFile(dir: string, filename: string): Promise<unknown | undefined> {
  const path = resolve(dir, filename)
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && (err as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined
    }
    throw err
  }
  try {
    return JSON.parse(raw)
  } catch (err) {
    throw new ConfigError(filename, `invalid JSON (${err instanceof Error ? err.message : String(err)})`)
  }
}

/** Parse with Zod; if the file was missing, seed it to disk with defaults. */
async function parseAndSeed<T>(dir: string, filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown | undefined): Promise<T> {
  const result = schema.safeParse(raw ?? {})
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = [filename.replace(/\.json$/, ''), ...issue.path].join('.')
    throw new ConfigError(field, issue.message)
  }
  if (raw === undefined) {
    await mkdir(dir, { recursive: true })
    await writeFile(resolve(dir, filename), JSON.stringify(result.data, null, 2) + '\n')
  }
  return result.data
}

export async function loadConfig(opts?: {
  configDir?: string
  env?: NodeJS.ProcessEnv
}): Promise<Config> {
  const dir = opts?.configDir ?? DEFAULT_CONFIG_DIR
  const files = ['telegram.json', 'access.json', 'providers.json', 'memory.json'] as const
  const raws = await Promise.all(files.map((f) => loadJsonFile(dir, f)))

  const config: Config = {
    telegram:  await parseAndSeed(dir, files[0], telegramSchema, raws[0]),
    access:    await parseAndSeed(dir, files[1], accessSchema, raws[1]),
    providers: await parseAndSeed(dir, files[2], providersSchema, raws[2]),
    memory:    await parseAndSeed(dir, files[3], memorySchema, raws[3]),
    credentials: loadCredentials(opts?.env),
  }
  validateConfig(config)
  return config
}

// ==================== Validation ====================

/** Cross-field checks zod can't express per file: models and keys of enabled providers. */
export function validateConfig(config: Config): void {
  for (const name of PROVIDER_NAMES) {
    const provider = config.providers[name]
    if (!provider.enabled) continue

    if (!provider.defaultModel) {
      throw new ConfigError(`providers.${name}.defaultModel`, 'is required when provider is enabled')
    }

    const credential = PROVIDER_CREDENTIALS[name]
    if (credential && !config.credentials[credential]) {
      throw new ConfigError(credential, `is required when ${name} provider is enabled`)
    }
  }
}

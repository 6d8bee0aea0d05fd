/**
 * Configuration
 *
 * Reads store selection and cache settings from the environment (a `.env`
 * file is loaded through dotenv) and validates them with zod. The adapter is
 * chosen here, once, so the rest of the library never branches on backend.
 *
 * Variables:
 * - CYLINDER_STORE: memory | csv | sqlite | supabase | sheets (default csv)
 * - CYLINDER_CACHE_TTL_SECONDS: load cache lifetime, 0 disables (default 600)
 * - CYLINDER_READ_ONLY: true to refuse every write (default false)
 * - CYLINDER_CSV_PATH, CYLINDER_SQLITE_PATH, CYLINDER_TABLE
 * - SUPABASE_URL, SUPABASE_KEY
 * - SHEETS_SPREADSHEET_ID, SHEETS_RANGE, SHEETS_API_KEY, SHEETS_ACCESS_TOKEN
 */
import dotenv from 'dotenv'
import { createClient } from '@supabase/supabase-js'
import { z } from 'zod'
import { type Adapter, createMemoryAdapter } from './adapter'
import { createCsvAdapter } from './csv-adapter'
import { ConfigError } from './errors'
import { createSheetsAdapter } from './sheets-adapter'
import { createSqliteAdapter } from './sqlite-adapter'
import { createSupabaseAdapter } from './supabase-adapter'

// ============================================================================
// Types
// ============================================================================

export type StoreConfig =
  | { kind: 'memory' }
  | { kind: 'csv'; path: string }
  | { kind: 'sqlite'; path: string; table?: string }
  | { kind: 'supabase'; url: string; key: string; table: string }
  | { kind: 'sheets'; spreadsheetId: string; range: string; apiKey?: string; accessToken?: string }

export type LedgerConfig = {
  store: StoreConfig
  cacheTtlMs: number
  readOnly: boolean
}

// ============================================================================
// Environment Schema
// ============================================================================

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((v) => v === 'true' || v === '1' || v === 'yes')

const optionalText = z.string().trim().min(1).optional()

const envSchema = z.object({
  CYLINDER_STORE: z.enum(['memory', 'csv', 'sqlite', 'supabase', 'sheets']).default('csv'),
  CYLINDER_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(600),
  CYLINDER_READ_ONLY: flag,
  CYLINDER_CSV_PATH: z.string().trim().min(1).default('cylinders.csv'),
  CYLINDER_SQLITE_PATH: z.string().trim().min(1).default('cylinders.db'),
  CYLINDER_TABLE: optionalText,
  SUPABASE_URL: z.string().trim().url().optional(),
  SUPABASE_KEY: optionalText,
  SHEETS_SPREADSHEET_ID: optionalText,
  SHEETS_RANGE: z.string().trim().min(1).default('Sheet1'),
  SHEETS_API_KEY: optionalText,
  SHEETS_ACCESS_TOKEN: optionalText,
})

type Env = z.infer<typeof envSchema>

function storeConfigOf(env: Env): StoreConfig {
  switch (env.CYLINDER_STORE) {
    case 'memory':
      return { kind: 'memory' }
    case 'csv':
      return { kind: 'csv', path: env.CYLINDER_CSV_PATH }
    case 'sqlite':
      return { kind: 'sqlite', path: env.CYLINDER_SQLITE_PATH, table: env.CYLINDER_TABLE }
    case 'supabase':
      if (!env.SUPABASE_URL || !env.SUPABASE_KEY) {
        throw new ConfigError('supabase store requires SUPABASE_URL and SUPABASE_KEY')
      }
      return { kind: 'supabase', url: env.SUPABASE_URL, key: env.SUPABASE_KEY, table: env.CYLINDER_TABLE ?? 'cylinders' }
    case 'sheets':
      if (!env.SHEETS_SPREADSHEET_ID) {
        throw new ConfigError('sheets store requires SHEETS_SPREADSHEET_ID')
      }
      if (!env.SHEETS_API_KEY && !env.SHEETS_ACCESS_TOKEN) {
        throw new ConfigError('sheets store requires SHEETS_API_KEY or SHEETS_ACCESS_TOKEN')
      }
      return {
        kind: 'sheets',
        spreadsheetId: env.SHEETS_SPREADSHEET_ID,
        range: env.SHEETS_RANGE,
        apiKey: env.SHEETS_API_KEY,
        accessToken: env.SHEETS_ACCESS_TOKEN,
      }
  }
}

/**
 * Validate configuration. Without an explicit `env`, `.env` is loaded into
 * `process.env` first. Throws ConfigError; this is startup-time only.
 */
/** `FOO=` in a .env file or a deploy template means "not set" */
function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const kept: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') kept[key] = value
  }
  return kept
}

export function loadConfig(env?: Record<string, string | undefined>): LedgerConfig {
  let source = env
  if (source === undefined) {
    dotenv.config()
    source = process.env
  }
  const parsed = envSchema.safeParse(withoutBlanks(source))
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`)
  }
  return {
    store: storeConfigOf(parsed.data),
    cacheTtlMs: parsed.data.CYLINDER_CACHE_TTL_SECONDS * 1000,
    readOnly: parsed.data.CYLINDER_READ_ONLY,
  }
}

// ============================================================================
// Adapter Selection
// ============================================================================

export type AdapterDeps = {
  /** HTTP client for the hosted backends */
  fetch?: typeof fetch
}

export async function createAdapterFromConfig(config: LedgerConfig, deps: AdapterDeps = {}): Promise<Adapter> {
  const { store, readOnly } = config
  switch (store.kind) {
    case 'memory':
      return createMemoryAdapter([], { readOnly })
    case 'csv':
      return createCsvAdapter(store.path, { readOnly })
    case 'sqlite':
      return createSqliteAdapter(store.path, { readOnly, table: store.table })
    case 'supabase': {
      const client = createClient(store.url, store.key, {
        auth: { persistSession: false, autoRefreshToken: false },
        ...(deps.fetch ? { global: { fetch: deps.fetch } } : {}),
      })
      return createSupabaseAdapter(client, { readOnly, table: store.table })
    }
    case 'sheets':
      return createSheetsAdapter({
        spreadsheetId: store.spreadsheetId,
        range: store.range,
        apiKey: store.apiKey,
        accessToken: store.accessToken,
        fetch: deps.fetch,
        readOnly,
      })
  }
}

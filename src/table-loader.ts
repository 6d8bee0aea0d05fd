/**
 * Table Loader
 *
 * Reads the full table through an adapter, normalizes it and keeps the result
 * for a configurable time-to-live. The cache is a plain value with the time it
 * was filled; invalidation and seeding are explicit transitions on it.
 */

import type { Adapter } from './adapter'
import { StoreUnavailableError } from './errors'
import { consoleLogger, type Logger } from './logger'
import { DEFAULT_RETRY_CONFIG, type RetryConfig, retryWithBackoff } from './retry'
import { normalizeRow } from './table-codec'
import { type Clock, systemClock } from './time-date'
import type { CylinderRecord, CylinderTable, RawRow } from './types'

// ============================================================================
// Types
// ============================================================================

export type CacheEntry = {
  readonly table: CylinderTable
  /** Timer reading (ms) when the entry was filled */
  readonly fetchedAt: number
  readonly ttlMs: number
}

export type LoadResult = {
  table: CylinderTable
  fromCache: boolean
  /** Present when the store could not be read; `table` is then empty */
  diagnostic?: StoreUnavailableError
  /** Rows dropped for lacking a Cylinder_ID */
  skippedRows: number
}

/**
 * `empty` until the first read, `loaded` after a successful read and
 * `degraded` while the most recent read failed.
 */
export type LoaderState = 'empty' | 'loaded' | 'degraded'

export type TableLoaderConfig = {
  adapter: Adapter
  /** Cache lifetime; 0 disables caching (default 600 000 ms) */
  ttlMs?: number
  clock?: Clock
  /** Monotonic-enough millisecond timer for cache age (default Date.now) */
  timer?: () => number
  retry?: RetryConfig
  logger?: Logger
}

export type TableLoader = {
  load(): Promise<LoadResult>
  /** Drop the cached table; the next load reads the store */
  invalidate(): void
  /** Replace the cached table without touching the store */
  seed(table: CylinderTable): void
  /** Current cache entry, if any, regardless of age */
  peek(): CacheEntry | null
  state(): LoaderState
}

export const DEFAULT_CACHE_TTL_MS = 600_000

export function isFresh(entry: CacheEntry | null, nowMs: number): entry is CacheEntry {
  return entry !== null && entry.ttlMs > 0 && nowMs - entry.fetchedAt < entry.ttlMs
}

// ============================================================================
// Factory
// ============================================================================

export function createTableLoader(config: TableLoaderConfig): TableLoader {
  const {
    adapter,
    ttlMs = DEFAULT_CACHE_TTL_MS,
    clock = systemClock,
    timer = Date.now,
    retry = DEFAULT_RETRY_CONFIG,
    logger = consoleLogger,
  } = config

  let cache: CacheEntry | null = null
  let state: LoaderState = 'empty'

  function remember(table: CylinderTable): void {
    cache = ttlMs > 0 ? { table, fetchedAt: timer(), ttlMs } : null
  }

  async function load(): Promise<LoadResult> {
    const entry = cache
    if (isFresh(entry, timer())) {
      return { table: entry.table, fromCache: true, skippedRows: 0 }
    }

    let rows: RawRow[]
    try {
      rows = await retryWithBackoff(() => adapter.readAll(), retry, `${adapter.name} read`, logger)
    } catch (e) {
      const diagnostic = e instanceof StoreUnavailableError
        ? e
        : new StoreUnavailableError(`Cannot read ${adapter.name} store`, { cause: e })
      logger.warn(`Loading cylinders failed, continuing with an empty table: ${diagnostic.message}`)
      state = 'degraded'
      return { table: [], fromCache: false, diagnostic, skippedRows: 0 }
    }

    const now = clock()
    const table: CylinderRecord[] = []
    let skippedRows = 0
    for (const row of rows) {
      const record = normalizeRow(row, now)
      if (record) table.push(record)
      else skippedRows++
    }
    if (skippedRows > 0) {
      logger.warn(`Skipped ${skippedRows} ${adapter.name} row(s) without a Cylinder_ID`)
    }

    remember(table)
    state = 'loaded'
    return { table, fromCache: false, skippedRows }
  }

  return {
    load,

    invalidate() {
      cache = null
    },

    seed(table) {
      remember(table)
    },

    peek() {
      return cache
    },

    state() {
      return state
    },
  }
}

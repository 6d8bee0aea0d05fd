/**
 * Cylinder Ledger
 *
 * Consumer-facing object that ties loader, queries and mutations together.
 * It owns the current table snapshot and threads it through every call, so
 * callers never hold a stale copy after a mutation.
 */

import type { Adapter } from './adapter'
import { createAdapterFromConfig, loadConfig, type AdapterDeps } from './config'
import type { InvalidPinError, RecordNotFoundError } from './errors'
import { consoleLogger, type Logger } from './logger'
import {
  createMutationCoordinator,
  type FillUpdateOutcome,
  type MutationOutcome,
  type NewCylinderInput,
  type NewRecordOutcome,
  type ReturnOutcome,
} from './mutations'
import {
  cylinderIds,
  distinctStatuses,
  filterByPin,
  lookupById,
  queryDashboard,
  summarize,
  type DashboardQuery,
  type TableSummary,
} from './query'
import type { Result } from './result'
import type { RetryConfig } from './retry'
import { exportCsv } from './table-codec'
import { createTableLoader, type LoadResult } from './table-loader'
import type { Clock } from './time-date'
import type { CylinderRecord, CylinderTable, ReturnCondition } from './types'

export type CylinderLedgerConfig = {
  adapter: Adapter
  cacheTtlMs?: number
  clock?: Clock
  timer?: () => number
  retry?: RetryConfig
  logger?: Logger
}

export type CylinderLedger = {
  readonly adapter: Adapter
  /**
   * Refresh the snapshot from the loader (cached within its TTL). A failed
   * read keeps the previous snapshot and returns it with the diagnostic.
   */
  load(): Promise<LoadResult>
  /** True while the most recent read failed; whole-table writes are refused */
  degraded(): boolean
  table(): CylinderTable
  dashboard(query?: DashboardQuery): CylinderTable
  findByPin(pin: string): Result<CylinderTable, InvalidPinError>
  lookup(id: string): Result<CylinderRecord, RecordNotFoundError>
  summary(query?: DashboardQuery): TableSummary
  statuses(): string[]
  ids(): string[]
  refill(id: string, fillPercent: number): Promise<FillUpdateOutcome>
  addCylinder(input: NewCylinderInput): Promise<NewRecordOutcome>
  returnCylinder(id: string, condition: ReturnCondition): Promise<ReturnOutcome>
  /** Snapshot as CSV, for when persistence is unavailable */
  exportCsv(): string
  close(): Promise<void>
}

export function createCylinderLedger(config: CylinderLedgerConfig): CylinderLedger {
  const { adapter, clock, timer, retry } = config
  const logger = config.logger ?? consoleLogger
  const loader = createTableLoader({ adapter, ttlMs: config.cacheTtlMs, clock, timer, retry, logger })
  const mutations = createMutationCoordinator({ adapter, loader, clock, retry, logger })

  let snapshot: CylinderTable = []

  function adopt<O extends MutationOutcome<Error, object>>(outcome: O): O {
    const settled: MutationOutcome<Error, object> = outcome
    if (settled.status !== 'rejected') snapshot = settled.table
    return outcome
  }

  return {
    adapter,

    async load() {
      const result = await loader.load()
      if (result.diagnostic) return { ...result, table: snapshot }
      snapshot = result.table
      return result
    },

    degraded: () => loader.state() === 'degraded',

    table: () => snapshot,
    dashboard: (query) => queryDashboard(snapshot, query),
    findByPin: (pin) => filterByPin(snapshot, pin),
    lookup: (id) => lookupById(snapshot, id),
    summary: (query) => summarize(query ? queryDashboard(snapshot, query) : snapshot),
    statuses: () => distinctStatuses(snapshot),
    ids: () => cylinderIds(snapshot),

    async refill(id, fillPercent) {
      return adopt(await mutations.applyFillUpdate(snapshot, id, fillPercent))
    },

    async addCylinder(input) {
      return adopt(await mutations.applyNewRecord(snapshot, input))
    },

    async returnCylinder(id, condition) {
      return adopt(await mutations.applyReturn(snapshot, id, condition))
    },

    exportCsv: () => exportCsv(snapshot),

    async close() {
      await adapter.close?.()
    },
  }
}

/** Build a ledger from environment configuration (see config.ts) */
export async function createCylinderLedgerFromEnv(
  env?: Record<string, string | undefined>,
  options: AdapterDeps & Omit<CylinderLedgerConfig, 'adapter' | 'cacheTtlMs'> = {},
): Promise<CylinderLedger> {
  const config = loadConfig(env)
  const { fetch, ...rest } = options
  const adapter = await createAdapterFromConfig(config, { fetch })
  return createCylinderLedger({ ...rest, adapter, cacheTtlMs: config.cacheTtlMs })
}

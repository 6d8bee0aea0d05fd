/**
 * Mutation Coordinator
 *
 * Applies one change to a table snapshot, writes it through to the adapter
 * and keeps the loader's cache honest. Every operation resolves to an
 * outcome value; nothing here throws past its boundary.
 *
 * Write-through assumes no other writer touches the store while a mutation
 * is in flight. There is no locking and no multi-row transaction.
 */

import { z } from 'zod'
import { type Adapter, capabilitiesOf } from './adapter'
import {
  DuplicateIdError,
  InvalidRangeError,
  RecordNotFoundError,
  StoreReadOnlyError,
  StoreUnavailableError,
  ValidationError,
} from './errors'
import { computeNextTestDue, computeOverdue } from './derived-fields'
import { consoleLogger, type Logger } from './logger'
import { evaluatePenalty, isDamaged } from './penalty'
import { indexOfId } from './query'
import { DEFAULT_RETRY_CONFIG, type RetryConfig, retryWithBackoff } from './retry'
import type { TableLoader } from './table-loader'
import { type Clock, type LocalDate, dateOf, parseDate, systemClock } from './time-date'
import type { CylinderRecord, CylinderTable, ReturnCondition, RowChanges } from './types'

// ============================================================================
// Outcomes
// ============================================================================

/** Why a change stayed in memory only */
export type PersistFailure = StoreReadOnlyError | StoreUnavailableError

export type MutationOutcome<E extends Error, X extends object = Record<never, never>> =
  | ({ status: 'persisted'; table: CylinderTable; record: CylinderRecord } & X)
  | ({ status: 'persisted-locally'; table: CylinderTable; record: CylinderRecord; reason: PersistFailure } & X)
  | { status: 'rejected'; error: E }

export type FillUpdateOutcome = MutationOutcome<RecordNotFoundError | InvalidRangeError>
export type NewRecordOutcome = MutationOutcome<ValidationError | DuplicateIdError>
export type ReturnOutcome = MutationOutcome<RecordNotFoundError, { liability: number }>

// ============================================================================
// New Record Input
// ============================================================================

export const DEFAULT_NEW_STATUS = 'Full'
export const DEFAULT_NEW_FILL = 100

const localDateSchema = z.string().trim().transform((s, ctx): LocalDate => {
  const parsed = parseDate(s)
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message })
    return z.NEVER
  }
  return parsed.value
})

export const newCylinderSchema = z.object({
  Cylinder_ID: z.string().trim().min(1, 'Cylinder_ID is required'),
  Location_PIN: z.string().trim().regex(/^\d{6}$/, 'Location_PIN must be exactly 6 digits'),
  Capacity_kg: z.number().positive().nullable().default(null),
  Fill_Percent: z.number().int().min(0).max(100).default(DEFAULT_NEW_FILL),
  Status: z.string().trim().min(1).default(DEFAULT_NEW_STATUS),
  Customer_Name: z.string().trim().nullable().default(null).transform((v) => (v === '' ? null : v)),
  Last_Fill_Date: localDateSchema.nullable().default(null),
  Last_Test_Date: localDateSchema.nullable().default(null),
})

export type NewCylinderInput = z.input<typeof newCylinderSchema>

// ============================================================================
// Coordinator
// ============================================================================

export type MutationCoordinatorConfig = {
  adapter: Adapter
  loader: TableLoader
  clock?: Clock
  retry?: RetryConfig
  logger?: Logger
}

export type MutationCoordinator = {
  applyFillUpdate(table: CylinderTable, id: string, fillPercent: number): Promise<FillUpdateOutcome>
  applyNewRecord(table: CylinderTable, input: NewCylinderInput): Promise<NewRecordOutcome>
  applyReturn(table: CylinderTable, id: string, condition: ReturnCondition): Promise<ReturnOutcome>
}

function replaceAt(table: CylinderTable, index: number, record: CylinderRecord): CylinderTable {
  return table.map((r, i) => (i === index ? record : r))
}

function asPersistFailure(e: unknown, adapterName: string): PersistFailure {
  if (e instanceof StoreReadOnlyError || e instanceof StoreUnavailableError) return e
  return new StoreUnavailableError(`Write to ${adapterName} store failed`, { cause: e })
}

export function createMutationCoordinator(config: MutationCoordinatorConfig): MutationCoordinator {
  const {
    adapter,
    loader,
    clock = systemClock,
    retry = DEFAULT_RETRY_CONFIG,
    logger = consoleLogger,
  } = config
  const caps = capabilitiesOf(adapter)

  /** Replacing the whole store is only safe over a table read from it */
  async function writeAll(table: CylinderTable): Promise<void> {
    const state = loader.state()
    if (state !== 'loaded') {
      const why = state === 'degraded' ? 'the last load failed' : 'the table was never loaded'
      throw new StoreUnavailableError(`Refusing to replace the ${adapter.name} store: ${why}`)
    }
    return retryWithBackoff(async () => adapter.writeAll?.(table), retry, `${adapter.name} write`, logger)
  }

  function noWritePath(): StoreReadOnlyError {
    return new StoreReadOnlyError(`${adapter.name} store has no write capability`)
  }

  /** Row-level update when the adapter has one, else full replace */
  async function persistUpdate(table: CylinderTable, id: string, changes: RowChanges): Promise<PersistFailure | null> {
    try {
      if (caps.writeRow) {
        try {
          await retryWithBackoff(async () => adapter.writeRow?.(id, changes), retry, `${adapter.name} write`, logger)
          return null
        } catch (e) {
          // Row missing upstream: fall back to rewriting the whole table
          if (!(e instanceof RecordNotFoundError) || !caps.writeAll) throw e
        }
      }
      if (caps.writeAll) {
        await writeAll(table)
        return null
      }
      return noWritePath()
    } catch (e) {
      return asPersistFailure(e, adapter.name)
    }
  }

  /** Row insert when the adapter has one, else full replace */
  async function persistAppend(table: CylinderTable, record: CylinderRecord): Promise<PersistFailure | DuplicateIdError | null> {
    try {
      if (caps.appendRow) {
        await adapter.appendRow?.(record)
        return null
      }
      if (caps.writeAll) {
        await writeAll(table)
        return null
      }
      return noWritePath()
    } catch (e) {
      if (e instanceof DuplicateIdError) return e
      return asPersistFailure(e, adapter.name)
    }
  }

  function settle(table: CylinderTable, record: CylinderRecord, failure: PersistFailure | null, action: string) {
    if (failure === null) {
      loader.invalidate()
      return { status: 'persisted' as const, table, record }
    }
    // Leave the cache empty while degraded so the next load reads the store
    if (loader.state() === 'loaded') loader.seed(table)
    logger.warn(`${action} kept in memory only: ${failure.message}`)
    return { status: 'persisted-locally' as const, table, record, reason: failure }
  }

  return {
    async applyFillUpdate(table, id, fillPercent) {
      if (!Number.isInteger(fillPercent) || fillPercent < 0 || fillPercent > 100) {
        return { status: 'rejected', error: new InvalidRangeError(`Fill percent must be an integer in [0, 100], got ${fillPercent}`) }
      }
      const index = indexOfId(table, id)
      const current = table[index]
      if (index === -1 || !current) return { status: 'rejected', error: new RecordNotFoundError(id) }

      const changes = { Fill_Percent: fillPercent, Last_Fill_Date: dateOf(clock()) }
      const record: CylinderRecord = { ...current, ...changes }
      const next = replaceAt(table, index, record)
      return settle(next, record, await persistUpdate(next, id, changes), `Refill of '${id}'`)
    },

    async applyNewRecord(table, input) {
      const parsed = newCylinderSchema.safeParse(input)
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`)
        return { status: 'rejected', error: new ValidationError(`Invalid cylinder: ${issues.join('; ')}`, issues) }
      }
      const fields = parsed.data
      if (indexOfId(table, fields.Cylinder_ID) !== -1) {
        return { status: 'rejected', error: new DuplicateIdError(fields.Cylinder_ID) }
      }

      const nextDue = computeNextTestDue(fields.Last_Test_Date)
      const record: CylinderRecord = {
        ...fields,
        Next_Test_Due: nextDue,
        Overdue: computeOverdue(nextDue, clock()),
      }
      const next = [...table, record]
      const failure = await persistAppend(next, record)
      if (failure instanceof DuplicateIdError) {
        // The store knows an id the snapshot does not: the cache is stale
        loader.invalidate()
        return { status: 'rejected', error: failure }
      }
      return settle(next, record, failure, `New cylinder '${record.Cylinder_ID}'`)
    },

    async applyReturn(table, id, condition) {
      const index = indexOfId(table, id)
      const current = table[index]
      if (index === -1 || !current) return { status: 'rejected', error: new RecordNotFoundError(id) }

      const overdue = computeOverdue(current.Next_Test_Due, clock())
      const liability = evaluatePenalty(condition, overdue)
      const changes = { Status: isDamaged(condition) ? 'Damaged' : 'Empty', Fill_Percent: 0 }
      const record: CylinderRecord = { ...current, ...changes, Overdue: overdue }
      const next = replaceAt(table, index, record)
      const outcome = settle(next, record, await persistUpdate(next, id, changes), `Return of '${id}'`)
      return { ...outcome, liability }
    },
  }
}

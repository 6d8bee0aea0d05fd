/**
 * cylinder-ledger
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  CylinderLedgerError, CylinderLedgerErrorCode,
  StoreUnavailableError, StoreReadOnlyError,
  RecordNotFoundError, DuplicateIdError,
  InvalidRangeError, InvalidPinError, ValidationError,
  ParseError, ConfigError,
} from './errors'
export type { CylinderLedgerErrorCode as CylinderLedgerErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Clock } from './time-date'
export {
  parseDate, coerceDate, fromSerialDate,
  makeDate, makeTime, makeDateTime, startOfDay, fromJsDate, systemClock,
  dateOf, addDays, daysBetween, compareDates, compareDateTimes,
} from './time-date'

// Records
export type { CylinderRecord, CylinderTable, CylinderColumn, RawRow, RowChanges, ReturnCondition } from './types'
export { CYLINDER_COLUMNS } from './types'

// Derived fields & penalties
export { TEST_VALIDITY_DAYS, computeNextTestDue, computeOverdue, refreshDerived } from './derived-fields'
export { PENALTY_POLICY, GOOD_CONDITION, evaluatePenalty, isDamaged } from './penalty'

// Codec
export type { CsvOptions, ParsedCsv } from './table-codec'
export {
  normalizePin, isValidPin, normalizeRow,
  toGrid, fromGrid, parseCsv, toCsv, exportCsv,
} from './table-codec'

// Queries
export type { TableSummary, DashboardQuery } from './query'
export {
  filterByStatus, filterByPin, filterOverdueOnly, sortByNextTestDue,
  lookupById, distinctStatuses, cylinderIds, summarize, queryDashboard,
} from './query'

// Adapters
export type { Adapter, AdapterCapabilities, AdapterOptions, MemoryAdapter } from './adapter'
export { createMemoryAdapter, capabilitiesOf } from './adapter'
export type { CsvAdapter } from './csv-adapter'
export { createCsvAdapter } from './csv-adapter'
export type { SqliteAdapter, SqliteAdapterOptions } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'
export type { SupabaseAdapter, SupabaseAdapterOptions } from './supabase-adapter'
export { createSupabaseAdapter } from './supabase-adapter'
export type { SheetsAdapter, SheetsAdapterOptions } from './sheets-adapter'
export { createSheetsAdapter } from './sheets-adapter'

// Loading
export type { CacheEntry, LoadResult, TableLoader, TableLoaderConfig } from './table-loader'
export { createTableLoader, DEFAULT_CACHE_TTL_MS } from './table-loader'
export type { RetryConfig } from './retry'
export { retryWithBackoff, DEFAULT_RETRY_CONFIG, NO_RETRY } from './retry'

// Mutations
export type {
  MutationOutcome, FillUpdateOutcome, NewRecordOutcome, ReturnOutcome,
  NewCylinderInput, PersistFailure, MutationCoordinator,
} from './mutations'
export { createMutationCoordinator, newCylinderSchema } from './mutations'

// Configuration & logging
export type { LedgerConfig, StoreConfig, AdapterDeps } from './config'
export { loadConfig, createAdapterFromConfig } from './config'
export type { Logger } from './logger'
export { consoleLogger, silentLogger } from './logger'

// High-level API (wraps all modules into a stateful ledger object)
export type { CylinderLedger, CylinderLedgerConfig } from './cylinder-ledger'
export { createCylinderLedger, createCylinderLedgerFromEnv } from './cylinder-ledger'

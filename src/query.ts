/**
 * Query Engine
 *
 * Filter, sort and lookup over a table snapshot. Pure; inputs are never mutated.
 */

import { type Result, Ok, Err } from './result'
import { InvalidPinError, RecordNotFoundError } from './errors'
import { compareDates } from './time-date'
import { isValidPin } from './table-codec'
import type { CylinderRecord, CylinderTable } from './types'

// ============================================================================
// Filters
// ============================================================================

/** Rows whose status is in `statuses`. An empty selection shows nothing. */
export function filterByStatus(table: CylinderTable, statuses: Iterable<string>): CylinderTable {
  const allowed = new Set(statuses)
  if (allowed.size === 0) return []
  return table.filter((r) => allowed.has(r.Status))
}

export function filterByPin(table: CylinderTable, pin: string): Result<CylinderTable, InvalidPinError> {
  const trimmed = pin.trim()
  if (!isValidPin(trimmed)) return Err(new InvalidPinError(trimmed))
  return Ok(table.filter((r) => r.Location_PIN === trimmed))
}

export function filterOverdueOnly(table: CylinderTable): CylinderTable {
  return table.filter((r) => r.Overdue)
}

// ============================================================================
// Sorting
// ============================================================================

/** Ascending by next test date; unknown dates last, ties keep table order */
export function sortByNextTestDue(table: CylinderTable): CylinderTable {
  return [...table].sort((a, b) => {
    if (a.Next_Test_Due === null) return b.Next_Test_Due === null ? 0 : 1
    if (b.Next_Test_Due === null) return -1
    return compareDates(a.Next_Test_Due, b.Next_Test_Due)
  })
}

// ============================================================================
// Lookup
// ============================================================================

/** First record with the id. Ids are unique in a well-formed table. */
export function lookupById(table: CylinderTable, id: string): Result<CylinderRecord, RecordNotFoundError> {
  const found = table.find((r) => r.Cylinder_ID === id)
  return found ? Ok(found) : Err(new RecordNotFoundError(id))
}

export function indexOfId(table: CylinderTable, id: string): number {
  return table.findIndex((r) => r.Cylinder_ID === id)
}

// ============================================================================
// Dashboard Helpers
// ============================================================================

export function distinctStatuses(table: CylinderTable): string[] {
  return [...new Set(table.map((r) => r.Status))].sort()
}

export function cylinderIds(table: CylinderTable): string[] {
  return [...new Set(table.map((r) => r.Cylinder_ID))].sort()
}

export type TableSummary = {
  total: number
  overdue: number
  /** Mean fill to one decimal, null when the table is empty */
  averageFill: number | null
}

export function summarize(table: CylinderTable): TableSummary {
  const overdue = table.filter((r) => r.Overdue).length
  if (table.length === 0) return { total: 0, overdue, averageFill: null }
  const sum = table.reduce((acc, r) => acc + r.Fill_Percent, 0)
  return {
    total: table.length,
    overdue,
    averageFill: Math.round((sum / table.length) * 10) / 10,
  }
}

export type DashboardQuery = {
  /** Omitted means every status present in the table */
  statuses?: Iterable<string>
  overdueOnly?: boolean
}

/** Status filter, optional overdue filter, then sort by next test date */
export function queryDashboard(table: CylinderTable, query: DashboardQuery = {}): CylinderTable {
  let rows = filterByStatus(table, query.statuses ?? distinctStatuses(table))
  if (query.overdueOnly) rows = filterOverdueOnly(rows)
  return sortByNextTestDue(rows)
}

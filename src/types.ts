/**
 * Shared Types
 *
 * The cylinder record as the rest of the library sees it, plus the loose
 * row shape stores hand back before normalization.
 */

import type { LocalDate } from './time-date'

export type { LocalDate, LocalDateTime, Clock } from './time-date'

// ============================================================================
// Columns
// ============================================================================

/** Canonical column order, used for CSV/grid headers and exports */
export const CYLINDER_COLUMNS = [
  'Cylinder_ID',
  'Capacity_kg',
  'Fill_Percent',
  'Status',
  'Location_PIN',
  'Customer_Name',
  'Last_Fill_Date',
  'Last_Test_Date',
  'Next_Test_Due',
  'Overdue',
] as const

export type CylinderColumn = (typeof CYLINDER_COLUMNS)[number]

// ============================================================================
// Records
// ============================================================================

export type CylinderRecord = {
  Cylinder_ID: string
  Capacity_kg: number | null
  Fill_Percent: number
  Status: string
  Location_PIN: string
  Customer_Name: string | null
  Last_Fill_Date: LocalDate | null
  Last_Test_Date: LocalDate | null
  Next_Test_Due: LocalDate | null
  Overdue: boolean
}

/** The full collection of records for one run. Operations return new tables. */
export type CylinderTable = readonly CylinderRecord[]

/** A row as a store returns it: column name to whatever the backend produced */
export type RawRow = Record<string, unknown>

/** Fields a single-row write may carry */
export type RowChanges = Partial<Omit<CylinderRecord, 'Cylinder_ID'>>

// ============================================================================
// Return Conditions
// ============================================================================

/** Condition reported when a cylinder comes back. Anything but 'Good' counts as damage. */
export type ReturnCondition = 'Good' | (string & {})

/**
 * Derived Fields
 *
 * Next test date and overdue flag. Pure, no I/O.
 *
 * The test interval is a fixed day count, not a calendar five-year add.
 */

import {
  type LocalDate,
  type LocalDateTime,
  addDays,
  compareDateTimes,
  startOfDay,
} from './time-date'
import type { CylinderRecord } from './types'

/** Hydrostatic test validity: five years as 5 × 365 days */
export const TEST_VALIDITY_DAYS = 1825

export function computeNextTestDue(lastTestDate: LocalDate | null): LocalDate | null {
  if (lastTestDate === null) return null
  return addDays(lastTestDate, TEST_VALIDITY_DAYS)
}

/**
 * A cylinder is overdue once the start of its due date lies strictly before `now`.
 * An unknown due date is never overdue.
 */
export function computeOverdue(nextTestDue: LocalDate | null, now: LocalDateTime): boolean {
  if (nextTestDue === null) return false
  return compareDateTimes(startOfDay(nextTestDue), now) < 0
}

/** Recompute the overdue flag against `now` */
export function refreshDerived(record: CylinderRecord, now: LocalDateTime): CylinderRecord {
  return { ...record, Overdue: computeOverdue(record.Next_Test_Due, now) }
}

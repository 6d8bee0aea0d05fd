/**
 * Segment 06: Query Engine Tests
 */
import { describe, it, expect } from 'vitest'
import {
  filterByStatus,
  filterByPin,
  filterOverdueOnly,
  sortByNextTestDue,
  lookupById,
  distinctStatuses,
  cylinderIds,
  summarize,
  queryDashboard,
} from '../src/query'
import { InvalidPinError, RecordNotFoundError } from '../src/errors'
import { date, makeRecord } from './helpers/records'

const table = [
  makeRecord({ Cylinder_ID: 'C-3', Status: 'Full', Fill_Percent: 100, Next_Test_Due: date('2027-05-01') }),
  makeRecord({ Cylinder_ID: 'C-1', Status: 'Empty', Fill_Percent: 0, Next_Test_Due: date('2025-01-01'), Overdue: true, Location_PIN: '032001' }),
  makeRecord({ Cylinder_ID: 'C-2', Status: 'Active', Fill_Percent: 45, Next_Test_Due: null }),
  makeRecord({ Cylinder_ID: 'C-4', Status: 'Full', Fill_Percent: 80, Next_Test_Due: date('2025-01-01'), Overdue: true }),
]

function ids(rows: readonly { Cylinder_ID: string }[]): string[] {
  return rows.map((r) => r.Cylinder_ID)
}

describe('Segment 06: Query Engine', () => {
  describe('filterByStatus', () => {
    it('keeps rows whose status is selected', () => {
      expect(ids(filterByStatus(table, ['Full', 'Empty']))).toEqual(['C-3', 'C-1', 'C-4'])
    })

    it('shows nothing for an empty selection', () => {
      expect(filterByStatus(table, [])).toEqual([])
    })

    it('matches statuses exactly', () => {
      expect(filterByStatus(table, ['full'])).toEqual([])
    })
  })

  describe('filterByPin', () => {
    it('returns rows at the PIN', () => {
      const result = filterByPin(table, '500033')
      expect(result.ok).toBe(true)
      if (result.ok) expect(ids(result.value)).toEqual(['C-3', 'C-2', 'C-4'])
    })

    it('trims the input and keeps leading zeros', () => {
      const result = filterByPin(table, ' 032001 ')
      expect(result.ok && ids(result.value)).toEqual(['C-1'])
    })

    it('returns an empty list for a valid PIN with no rows', () => {
      const result = filterByPin(table, '999999')
      expect(result).toEqual({ ok: true, value: [] })
    })

    it.each(['32001', '50003a', '5000333', ''])('rejects %j', (pin) => {
      const result = filterByPin(table, pin)
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error).toBeInstanceOf(InvalidPinError)
    })
  })

  describe('filterOverdueOnly', () => {
    it('keeps flagged rows', () => {
      expect(ids(filterOverdueOnly(table))).toEqual(['C-1', 'C-4'])
    })
  })

  describe('sortByNextTestDue', () => {
    it('sorts ascending, unknown dates last, ties in table order', () => {
      expect(ids(sortByNextTestDue(table))).toEqual(['C-1', 'C-4', 'C-3', 'C-2'])
    })

    it('does not reorder its input', () => {
      sortByNextTestDue(table)
      expect(ids(table)).toEqual(['C-3', 'C-1', 'C-2', 'C-4'])
    })
  })

  describe('lookupById', () => {
    it('finds a record', () => {
      const result = lookupById(table, 'C-2')
      expect(result.ok && result.value.Status).toBe('Active')
    })

    it('returns the first match for a duplicated id', () => {
      const dup = [...table, makeRecord({ Cylinder_ID: 'C-2', Status: 'Later' })]
      const result = lookupById(dup, 'C-2')
      expect(result.ok && result.value.Status).toBe('Active')
    })

    it('reports a missing id', () => {
      const result = lookupById(table, 'C-9')
      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RecordNotFoundError)
        expect(result.error.cylinderId).toBe('C-9')
      }
    })
  })

  describe('dashboard helpers', () => {
    it('lists distinct statuses and ids sorted', () => {
      expect(distinctStatuses(table)).toEqual(['Active', 'Empty', 'Full'])
      expect(cylinderIds(table)).toEqual(['C-1', 'C-2', 'C-3', 'C-4'])
    })

    it('summarizes counts and mean fill', () => {
      expect(summarize(table)).toEqual({ total: 4, overdue: 2, averageFill: 56.3 })
      expect(summarize([])).toEqual({ total: 0, overdue: 0, averageFill: null })
    })

    it('shows every status sorted by next test date by default', () => {
      expect(ids(queryDashboard(table))).toEqual(['C-1', 'C-4', 'C-3', 'C-2'])
    })

    it('applies status and overdue filters together', () => {
      expect(ids(queryDashboard(table, { statuses: ['Full'], overdueOnly: true }))).toEqual(['C-4'])
      expect(queryDashboard(table, { statuses: [] })).toEqual([])
    })
  })
})

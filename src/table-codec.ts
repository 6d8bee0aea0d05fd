/**
 * Table Codec
 *
 * Turns loose store rows into CylinderRecords and records back into text
 * cells, grids and CSV. Stores depend on the logical schema only; this is
 * where wire quirks (numeric PINs, decimal tails, blank cells) are ironed out.
 */

import Papa from 'papaparse'
import { coerceDate, type LocalDateTime } from './time-date'
import { computeNextTestDue, computeOverdue } from './derived-fields'
import {
  CYLINDER_COLUMNS,
  type CylinderColumn,
  type CylinderRecord,
  type CylinderTable,
  type RawRow,
} from './types'

// ============================================================================
// Field Normalizers
// ============================================================================

const PIN_LENGTH = 6

/**
 * Text form of a location PIN. Numeric sources lose leading zeros and
 * sometimes gain a decimal tail ("500033.0"); both are undone here.
 */
export function normalizePin(value: unknown): string {
  if (value === null || value === undefined) return ''
  let text = typeof value === 'number' && Number.isFinite(value)
    ? String(Math.trunc(value))
    : String(value).trim()
  text = text.replace(/\.0*$/, '')
  if (/^\d{1,5}$/.test(text)) text = text.padStart(PIN_LENGTH, '0')
  return text
}

export function isValidPin(pin: string): boolean {
  return /^\d{6}$/.test(pin)
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim())
    return Number.isFinite(n) ? n : null
  }
  return null
}

export function normalizeFill(value: unknown): number {
  const n = toNumber(value)
  if (n === null) return 0
  return Math.min(100, Math.max(0, Math.round(n)))
}

export function normalizeCapacity(value: unknown): number | null {
  const n = toNumber(value)
  return n !== null && n > 0 ? n : null
}

function toText(value: unknown): string {
  if (value === null || value === undefined) return ''
  return String(value).trim()
}

function toOptionalText(value: unknown): string | null {
  const text = toText(value)
  return text === '' ? null : text
}

// ============================================================================
// Raw Row → Record
// ============================================================================

/**
 * Normalize one store row. Each date is parsed on its own and becomes null
 * when unreadable; the row survives. Rows without an id cannot be addressed
 * and yield null.
 */
export function normalizeRow(row: RawRow, now: LocalDateTime): CylinderRecord | null {
  const id = toText(row['Cylinder_ID'])
  if (id === '') return null

  const lastTest = coerceDate(row['Last_Test_Date'])
  const nextDue = coerceDate(row['Next_Test_Due']) ?? computeNextTestDue(lastTest)

  return {
    Cylinder_ID: id,
    Capacity_kg: normalizeCapacity(row['Capacity_kg']),
    Fill_Percent: normalizeFill(row['Fill_Percent']),
    Status: toText(row['Status']),
    Location_PIN: normalizePin(row['Location_PIN']),
    Customer_Name: toOptionalText(row['Customer_Name']),
    Last_Fill_Date: coerceDate(row['Last_Fill_Date']),
    Last_Test_Date: lastTest,
    Next_Test_Due: nextDue,
    Overdue: computeOverdue(nextDue, now),
  }
}

// ============================================================================
// Record → Cells
// ============================================================================

export function cellOf(value: CylinderRecord[CylinderColumn]): string {
  if (value === null) return ''
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  return String(value)
}

export function toCells(record: CylinderRecord): string[] {
  return CYLINDER_COLUMNS.map((col) => cellOf(record[col]))
}

/** Header row followed by one row of cells per record */
export function toGrid(table: CylinderTable): string[][] {
  return [[...CYLINDER_COLUMNS], ...table.map(toCells)]
}

/** Two-dimensional grid (first row = header) to loose rows */
export function fromGrid(grid: readonly (readonly unknown[])[]): RawRow[] {
  const [header, ...body] = grid
  if (!header) return []
  const names = header.map((h) => toText(h))
  return body
    .filter((cells) => cells.some((c) => toText(c) !== ''))
    .map((cells) => {
      const row: RawRow = {}
      names.forEach((name, i) => {
        if (name !== '') row[name] = cells[i] ?? null
      })
      return row
    })
}

// ============================================================================
// CSV
// ============================================================================

export type ParsedCsv = {
  columns: string[]
  rows: RawRow[]
}

/** Every cell stays text so PINs keep their leading zeros */
export function parseCsv(text: string): ParsedCsv {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (h) => h.trim(),
  })
  return { columns: result.meta.fields ?? [], rows: result.data }
}

export type CsvOptions = {
  /** Prefix cells starting with = + - @ so spreadsheets show them as text */
  escapeFormulae?: boolean
}

/** UTF-8 CSV, one header row, ISO-8601 dates */
export function toCsv(table: CylinderTable, options: CsvOptions = {}): string {
  return Papa.unparse(
    { fields: [...CYLINDER_COLUMNS], data: table.map(toCells) },
    { newline: '\n', escapeFormulae: options.escapeFormulae ?? false },
  )
}

/** Exported artifact for download; formula-like cells are neutralized */
export function exportCsv(table: CylinderTable): string {
  return toCsv(table, { escapeFormulae: true })
}

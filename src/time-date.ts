/**
 * Time & Date Utilities
 *
 * Pure functions for date parsing, formatting and arithmetic.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

/** Source of the current instant. Injected everywhere "now" matters. */
export type Clock = () => LocalDateTime

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/
const US_DATE_PREFIX = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:$| )/

/** Day zero of spreadsheet serial dates (Sheets, Excel). */
const SERIAL_EPOCH_YEAR = 1899
const SERIAL_EPOCH_MONTH = 12
const SERIAL_EPOCH_DAY = 30
const MAX_SERIAL = 2958465

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))
  return validateParts(str, match[1], match[2], match[3])
}

/**
 * Lenient date coercion for values arriving from a store.
 *
 * Accepts a plain date, a date followed by a time (`T` or space separated,
 * any zone suffix ignored), a month-first `M/D/YYYY` date, a spreadsheet
 * serial day number or a JS Date. Anything else yields null.
 */
export function coerceDate(value: unknown): LocalDate | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null
    return makeDate(value.getFullYear(), value.getMonth() + 1, value.getDate())
  }
  if (typeof value === 'number') return fromSerialDate(value)
  if (typeof value !== 'string') return null
  const str = value.trim()
  const iso = DATE_PREFIX.exec(str)
  const us = iso ? null : US_DATE_PREFIX.exec(str)
  const result = iso
    ? validateParts(str, iso[1], iso[2], iso[3])
    : us
      ? validateParts(str, us[3], us[1], us[2])
      : null
  return result?.ok ? result.value : null
}

/**
 * Converts a spreadsheet serial date (days since 1899-12-30, fraction = time
 * of day) to a date. Non-finite or out-of-range serials yield null.
 */
export function fromSerialDate(serial: number): LocalDate | null {
  if (!Number.isFinite(serial) || serial < 1 || serial > MAX_SERIAL) return null
  const epoch = makeDate(SERIAL_EPOCH_YEAR, SERIAL_EPOCH_MONTH, SERIAL_EPOCH_DAY)
  return addDays(epoch, Math.floor(serial))
}

function validateParts(
  str: string,
  y: string | undefined,
  m: string | undefined,
  d: string | undefined,
): Result<LocalDate, ParseError> {
  const year = parseInt(y ?? '', 10)
  const month = parseInt(m ?? '', 10)
  const day = parseInt(d ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

/** Midnight at the start of `date` */
export function startOfDay(date: LocalDate): LocalDateTime {
  return makeDateTime(date, makeTime(0, 0, 0))
}

/** Wall-clock reading of a JS Date in the process timezone */
export function fromJsDate(d: Date): LocalDateTime {
  return makeDateTime(
    makeDate(d.getFullYear(), d.getMonth() + 1, d.getDate()),
    makeTime(d.getHours(), d.getMinutes(), d.getSeconds()),
  )
}

export const systemClock: Clock = () => fromJsDate(new Date())

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

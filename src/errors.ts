/**
 * Consolidated error system for cylinder-ledger.
 *
 * All error classes extend CylinderLedgerError, which carries a typed error code.
 * Boundary operations (load, mutations) return these as values instead of throwing.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CylinderLedgerErrorCode = {
  // Store layer
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  STORE_READ_ONLY: 'STORE_READ_ONLY',

  // Records
  RECORD_NOT_FOUND: 'RECORD_NOT_FOUND',
  DUPLICATE_ID: 'DUPLICATE_ID',

  // Caller input
  INVALID_RANGE: 'INVALID_RANGE',
  INVALID_PIN: 'INVALID_PIN',
  VALIDATION: 'VALIDATION',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',

  // Startup
  CONFIG: 'CONFIG',
} as const

export type CylinderLedgerErrorCode = (typeof CylinderLedgerErrorCode)[keyof typeof CylinderLedgerErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CylinderLedgerError extends Error {
  readonly code: CylinderLedgerErrorCode

  constructor(code: CylinderLedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CylinderLedgerError'
    this.code = code
  }
}

// ============================================================================
// Store Errors
// ============================================================================

export class StoreUnavailableError extends CylinderLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(CylinderLedgerErrorCode.STORE_UNAVAILABLE, message, options)
    this.name = 'StoreUnavailableError'
  }
}

export class StoreReadOnlyError extends CylinderLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(CylinderLedgerErrorCode.STORE_READ_ONLY, message, options)
    this.name = 'StoreReadOnlyError'
  }
}

// ============================================================================
// Record Errors
// ============================================================================

export class RecordNotFoundError extends CylinderLedgerError {
  readonly cylinderId: string

  constructor(cylinderId: string) {
    super(CylinderLedgerErrorCode.RECORD_NOT_FOUND, `Cylinder '${cylinderId}' not found`)
    this.name = 'RecordNotFoundError'
    this.cylinderId = cylinderId
  }
}

export class DuplicateIdError extends CylinderLedgerError {
  readonly cylinderId: string

  constructor(cylinderId: string) {
    super(CylinderLedgerErrorCode.DUPLICATE_ID, `Cylinder '${cylinderId}' already exists`)
    this.name = 'DuplicateIdError'
    this.cylinderId = cylinderId
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class InvalidRangeError extends CylinderLedgerError {
  constructor(message: string) {
    super(CylinderLedgerErrorCode.INVALID_RANGE, message)
    this.name = 'InvalidRangeError'
  }
}

export class InvalidPinError extends CylinderLedgerError {
  readonly pin: string

  constructor(pin: string) {
    super(CylinderLedgerErrorCode.INVALID_PIN, `PIN must be exactly 6 digits, got '${pin}'`)
    this.name = 'InvalidPinError'
    this.pin = pin
  }
}

export class ValidationError extends CylinderLedgerError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(CylinderLedgerErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
    this.issues = issues
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends CylinderLedgerError {
  constructor(message: string) {
    super(CylinderLedgerErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigError extends CylinderLedgerError {
  constructor(message: string) {
    super(CylinderLedgerErrorCode.CONFIG, message)
    this.name = 'ConfigError'
  }
}

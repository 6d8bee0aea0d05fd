/**
 * Adapter
 *
 * Capability interface over a backing store + in-memory implementation.
 * Every backend reads the whole table; writes come in three optional
 * flavours and the mutation coordinator picks the narrowest one available.
 */

import { DuplicateIdError, RecordNotFoundError, StoreReadOnlyError } from './errors'
import type { CylinderRecord, CylinderTable, RawRow, RowChanges } from './types'

export type { CylinderRecord, CylinderTable, RawRow, RowChanges } from './types'

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /** Backend label used in log lines and error messages */
  readonly name: string

  /** Current full contents. Throws StoreUnavailableError when the store cannot be read. */
  readAll(): Promise<RawRow[]>

  /** Update one row's fields. Throws RecordNotFoundError or StoreReadOnlyError. */
  writeRow?(id: string, changes: RowChanges): Promise<void>

  /** Insert one new row. Throws DuplicateIdError or StoreReadOnlyError. */
  appendRow?(record: CylinderRecord): Promise<void>

  /** Replace the full contents. Throws StoreReadOnlyError. */
  writeAll?(table: CylinderTable): Promise<void>

  // Lifecycle (optional; persistent adapters may implement)
  close?(): Promise<void>
}

export type AdapterCapabilities = {
  writeRow: boolean
  appendRow: boolean
  writeAll: boolean
}

export function capabilitiesOf(adapter: Adapter): AdapterCapabilities {
  return {
    writeRow: typeof adapter.writeRow === 'function',
    appendRow: typeof adapter.appendRow === 'function',
    writeAll: typeof adapter.writeAll === 'function',
  }
}

/** Options every backend accepts */
export type AdapterOptions = {
  /** Reject every write with StoreReadOnlyError */
  readOnly?: boolean
}

export function assertWritable(name: string, readOnly: boolean | undefined): void {
  if (readOnly) throw new StoreReadOnlyError(`${name} store is read-only`)
}

// ============================================================================
// Memory Adapter
// ============================================================================

export type MemoryAdapter = Adapter & {
  writeRow(id: string, changes: RowChanges): Promise<void>
  appendRow(record: CylinderRecord): Promise<void>
  writeAll(table: CylinderTable): Promise<void>
  /** Copy of the stored rows, in insertion order */
  rows(): RawRow[]
  /** Number of readAll calls served so far */
  readCount(): number
}

export function createMemoryAdapter(initial: readonly RawRow[] = [], options: AdapterOptions = {}): MemoryAdapter {
  const name = 'memory'
  let state: RawRow[] = initial.map((r) => structuredClone(r))
  let reads = 0

  function indexOf(id: string): number {
    return state.findIndex((r) => String(r['Cylinder_ID'] ?? '').trim() === id)
  }

  return {
    name,

    async readAll() {
      reads++
      return state.map((r) => structuredClone(r))
    },

    async writeRow(id, changes) {
      assertWritable(name, options.readOnly)
      const idx = indexOf(id)
      const existing = state[idx]
      if (idx === -1 || !existing) throw new RecordNotFoundError(id)
      state = state.map((r, i) => (i === idx ? { ...existing, ...structuredClone(changes) } : r))
    },

    async appendRow(record) {
      assertWritable(name, options.readOnly)
      if (indexOf(record.Cylinder_ID) !== -1) throw new DuplicateIdError(record.Cylinder_ID)
      state = [...state, { ...record }]
    },

    async writeAll(table) {
      assertWritable(name, options.readOnly)
      state = table.map((r) => ({ ...r }))
    },

    rows() {
      return state.map((r) => structuredClone(r))
    },

    readCount() {
      return reads
    },
  }
}

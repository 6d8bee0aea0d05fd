/**
 * Supabase Adapter
 *
 * Hosted relational table reached through the Supabase client (PostgREST).
 * Rows arrive as JSON objects keyed by column name. Supports row update and
 * row insert; there is no full-table replace.
 */
import type { SupabaseClient } from '@supabase/supabase-js'
import { type Adapter, type AdapterOptions, assertWritable } from './adapter'
import {
  DuplicateIdError,
  RecordNotFoundError,
  StoreReadOnlyError,
  StoreUnavailableError,
} from './errors'
import type { CylinderRecord, RawRow, RowChanges } from './types'

export type SupabaseAdapterOptions = AdapterOptions & {
  /** Table holding the cylinders (default `cylinders`) */
  table?: string
}

export type SupabaseAdapter = Adapter & {
  writeRow(id: string, changes: RowChanges): Promise<void>
  appendRow(record: CylinderRecord): Promise<void>
}

type PostgrestFailure = {
  error: { message: string; code?: string } | null
  status: number
}

const UNIQUE_VIOLATION = '23505'

function isRawRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function failureOf(name: string, context: string, res: PostgrestFailure): Error {
  const detail = res.error?.message ?? `HTTP ${res.status}`
  if (res.status === 401 || res.status === 403) {
    return new StoreReadOnlyError(`${name} rejected write (${context}): ${detail}`)
  }
  return new StoreUnavailableError(`${name} request failed (${context}): ${detail}`)
}

export function createSupabaseAdapter(client: SupabaseClient, options: SupabaseAdapterOptions = {}): SupabaseAdapter {
  const name = 'supabase'
  const table = options.table ?? 'cylinders'

  return {
    name,

    async readAll() {
      let res: PostgrestFailure & { data: unknown }
      try {
        res = await client.from(table).select('*')
      } catch (e) {
        throw new StoreUnavailableError(`Cannot reach ${name} table '${table}'`, { cause: e })
      }
      if (res.error) {
        throw new StoreUnavailableError(`Cannot read ${name} table '${table}': ${res.error.message}`)
      }
      const data = res.data
      if (!Array.isArray(data) || !data.every(isRawRow)) {
        throw new StoreUnavailableError(`Malformed response from ${name} table '${table}'`)
      }
      return data
    },

    async writeRow(id, changes) {
      assertWritable(name, options.readOnly)
      let res: PostgrestFailure & { data: unknown }
      try {
        res = await client.from(table).update(changes).eq('Cylinder_ID', id).select('Cylinder_ID')
      } catch (e) {
        throw new StoreUnavailableError(`Cannot reach ${name} table '${table}'`, { cause: e })
      }
      if (res.error) throw failureOf(name, `update '${id}'`, res)
      if (!Array.isArray(res.data) || res.data.length === 0) throw new RecordNotFoundError(id)
    },

    async appendRow(record) {
      assertWritable(name, options.readOnly)
      let res: PostgrestFailure
      try {
        res = await client.from(table).insert({ ...record })
      } catch (e) {
        throw new StoreUnavailableError(`Cannot reach ${name} table '${table}'`, { cause: e })
      }
      if (res.error?.code === UNIQUE_VIOLATION) throw new DuplicateIdError(record.Cylinder_ID)
      if (res.error) throw failureOf(name, `insert '${record.Cylinder_ID}'`, res)
    },
  }
}

/**
 * SQLite Adapter
 *
 * Relational implementation of the adapter using better-sqlite3.
 * Supports every write capability: row update, row insert and full replace.
 */
import Database from 'better-sqlite3'
import { type Adapter, type AdapterOptions, assertWritable } from './adapter'
import {
  DuplicateIdError,
  RecordNotFoundError,
  StoreReadOnlyError,
  StoreUnavailableError,
} from './errors'
import type { CylinderColumn, CylinderRecord, CylinderTable, RawRow, RowChanges } from './types'

export type SqliteAdapterOptions = AdapterOptions & {
  /** Table holding the cylinders (default `cylinder`) */
  table?: string
}

export type SqliteAdapter = Adapter & {
  writeRow(id: string, changes: RowChanges): Promise<void>
  appendRow(record: CylinderRecord): Promise<void>
  writeAll(table: CylinderTable): Promise<void>
  close(): Promise<void>
}

// ============================================================================
// Schema
// ============================================================================

const COLUMN_NAMES: Record<CylinderColumn, string> = {
  Cylinder_ID: 'cylinder_id',
  Capacity_kg: 'capacity_kg',
  Fill_Percent: 'fill_percent',
  Status: 'status',
  Location_PIN: 'location_pin',
  Customer_Name: 'customer_name',
  Last_Fill_Date: 'last_fill_date',
  Last_Test_Date: 'last_test_date',
  Next_Test_Due: 'next_test_due',
  Overdue: 'overdue',
}

function schemaSql(table: string): string {
  return `
  CREATE TABLE IF NOT EXISTS ${table} (
    cylinder_id TEXT PRIMARY KEY,
    capacity_kg REAL,
    fill_percent INTEGER NOT NULL DEFAULT 0 CHECK (fill_percent BETWEEN 0 AND 100),
    status TEXT NOT NULL DEFAULT '',
    location_pin TEXT NOT NULL DEFAULT '',
    customer_name TEXT,
    last_fill_date TEXT,
    last_test_date TEXT,
    next_test_due TEXT,
    overdue INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_${table}_pin ON ${table}(location_pin);
`
}

// ============================================================================
// SQL Row Types
// ============================================================================

type CylinderRow = {
  cylinder_id: string
  capacity_kg: number | null
  fill_percent: number
  status: string
  location_pin: string
  customer_name: string | null
  last_fill_date: string | null
  last_test_date: string | null
  next_test_due: string | null
  overdue: number
}

function toRawRow(row: CylinderRow): RawRow {
  return {
    Cylinder_ID: row.cylinder_id,
    Capacity_kg: row.capacity_kg,
    Fill_Percent: row.fill_percent,
    Status: row.status,
    Location_PIN: row.location_pin,
    Customer_Name: row.customer_name,
    Last_Fill_Date: row.last_fill_date,
    Last_Test_Date: row.last_test_date,
    Next_Test_Due: row.next_test_due,
    Overdue: row.overdue === 1,
  }
}

function sqlValue(value: CylinderRecord[CylinderColumn]): string | number | null {
  if (typeof value === 'boolean') return value ? 1 : 0
  return value
}

function recordParams(record: CylinderRecord): (string | number | null)[] {
  return [
    record.Cylinder_ID,
    record.Capacity_kg,
    record.Fill_Percent,
    record.Status,
    record.Location_PIN,
    record.Customer_Name,
    record.Last_Fill_Date,
    record.Last_Test_Date,
    record.Next_Test_Due,
    record.Overdue ? 1 : 0,
  ]
}

// ============================================================================
// Error Mapping
// ============================================================================

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code
  return undefined
}

function mapError(e: unknown, context: string): never {
  const code = errorCode(e) ?? ''
  const msg = e instanceof Error ? e.message : String(e)
  if (code.startsWith('SQLITE_READONLY')) throw new StoreReadOnlyError(`${context}: ${msg}`, { cause: e })
  throw new StoreUnavailableError(`${context}: ${msg}`, { cause: e })
}

function isUniqueViolation(e: unknown): boolean {
  const code = errorCode(e) ?? ''
  return code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || code === 'SQLITE_CONSTRAINT_UNIQUE'
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string, options: SqliteAdapterOptions = {}): Promise<SqliteAdapter> {
  const name = 'sqlite'
  const table = options.table ?? 'cylinder'
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(table)) {
    throw new StoreUnavailableError(`Invalid table name '${table}'`)
  }

  let db: Database.Database
  try {
    db = new Database(path)
    db.exec(schemaSql(table))
  } catch (e) {
    mapError(e, `Cannot open SQLite store at '${path}'`)
  }

  const columnList = Object.values(COLUMN_NAMES).join(', ')
  const placeholders = Object.values(COLUMN_NAMES).map(() => '?').join(', ')
  const insertSql = `INSERT INTO ${table} (${columnList}) VALUES (${placeholders})`

  const replaceAll = db.transaction((records: CylinderTable) => {
    db.prepare(`DELETE FROM ${table}`).run()
    const insert = db.prepare<unknown[]>(insertSql)
    for (const record of records) insert.run(...recordParams(record))
  })

  return {
    name,

    async readAll() {
      try {
        const rows = db.prepare<[], CylinderRow>(`SELECT * FROM ${table} ORDER BY rowid`).all()
        return rows.map(toRawRow)
      } catch (e) {
        mapError(e, 'Cannot read cylinders')
      }
    },

    async writeRow(id, changes) {
      assertWritable(name, options.readOnly)
      const entries = Object.entries(COLUMN_NAMES).filter(
        (entry): entry is [Exclude<CylinderColumn, 'Cylinder_ID'>, string] =>
          entry[0] !== 'Cylinder_ID' && entry[0] in changes,
      )
      let changed: number
      try {
        if (entries.length === 0) {
          changed = db.prepare<[string], { n: number }>(
            `SELECT COUNT(*) AS n FROM ${table} WHERE cylinder_id = ?`,
          ).get(id)?.n ?? 0
        } else {
          const sets = entries.map(([, col]) => `${col} = ?`).join(', ')
          const values = entries.map(([field]) => sqlValue(changes[field] ?? null))
          changed = db.prepare<unknown[]>(`UPDATE ${table} SET ${sets} WHERE cylinder_id = ?`)
            .run(...values, id).changes
        }
      } catch (e) {
        mapError(e, `Cannot update cylinder '${id}'`)
      }
      if (changed === 0) throw new RecordNotFoundError(id)
    },

    async appendRow(record) {
      assertWritable(name, options.readOnly)
      try {
        db.prepare<unknown[]>(insertSql).run(...recordParams(record))
      } catch (e) {
        if (isUniqueViolation(e)) throw new DuplicateIdError(record.Cylinder_ID)
        mapError(e, `Cannot insert cylinder '${record.Cylinder_ID}'`)
      }
    },

    async writeAll(records) {
      assertWritable(name, options.readOnly)
      try {
        replaceAll(records)
      } catch (e) {
        mapError(e, 'Cannot replace cylinders')
      }
    },

    async close() {
      db.close()
    },
  }
}

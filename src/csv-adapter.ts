/**
 * CSV Adapter
 *
 * Flat-file store. Reads with papaparse, keeps every cell as text and
 * writes the whole table back; there is no single-row primitive. Writes go
 * to a temporary file beside the target and are renamed over it.
 */
import { readFile, rename, rm, writeFile } from 'node:fs/promises'
import { type Adapter, type AdapterOptions, assertWritable } from './adapter'
import { StoreReadOnlyError, StoreUnavailableError } from './errors'
import { parseCsv, toCsv } from './table-codec'
import type { CylinderTable } from './types'

export type CsvAdapter = Adapter & {
  writeAll(table: CylinderTable): Promise<void>
  readonly path: string
}

const READ_ONLY_CODES = new Set(['EROFS', 'EACCES', 'EPERM'])

function errnoOf(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code
  return undefined
}

export function createCsvAdapter(path: string, options: AdapterOptions = {}): CsvAdapter {
  const name = 'csv'

  return {
    name,
    path,

    async readAll() {
      let text: string
      try {
        text = await readFile(path, 'utf8')
      } catch (e) {
        if (errnoOf(e) === 'ENOENT') {
          throw new StoreUnavailableError(`CSV file not found: '${path}'`, { cause: e })
        }
        throw new StoreUnavailableError(`Cannot read CSV file '${path}'`, { cause: e })
      }
      // Strip a UTF-8 byte order mark left by spreadsheet exports
      const { columns, rows } = parseCsv(text.replace(/^\uFEFF/, ''))
      if (rows.length > 0 && !columns.includes('Cylinder_ID')) {
        throw new StoreUnavailableError(`CSV file '${path}' has no Cylinder_ID column`)
      }
      return rows
    },

    async writeAll(table) {
      assertWritable(name, options.readOnly)
      const temp = `${path}.${process.pid}.tmp`
      try {
        await writeFile(temp, toCsv(table) + '\n', 'utf8')
        await rename(temp, path)
      } catch (e) {
        await rm(temp, { force: true })
        const code = errnoOf(e)
        if (code !== undefined && READ_ONLY_CODES.has(code)) {
          throw new StoreReadOnlyError(`CSV file '${path}' is not writable`, { cause: e })
        }
        throw new StoreUnavailableError(`Cannot write CSV file '${path}'`, { cause: e })
      }
    },
  }
}

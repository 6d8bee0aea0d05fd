/**
 * Sheets Adapter
 *
 * Spreadsheet store backed by the Google Sheets v4 values API. The range is
 * read as a grid whose first row is the header. Cells are requested
 * unformatted, so dates arrive as serial day numbers whatever the sheet's
 * display format. A write replaces the whole grid in one PUT, padded with
 * blank cells over whatever the range held before. Writing needs an OAuth
 * access token; an API key alone gives read access only.
 */
import { z } from 'zod'
import { type Adapter, type AdapterOptions, assertWritable } from './adapter'
import { StoreReadOnlyError, StoreUnavailableError } from './errors'
import { fromGrid, toGrid } from './table-codec'
import type { CylinderTable } from './types'

export type SheetsAdapterOptions = AdapterOptions & {
  spreadsheetId: string
  /** A1 range or sheet name (default `Sheet1`) */
  range?: string
  apiKey?: string
  accessToken?: string
  fetch?: typeof fetch
  baseUrl?: string
}

export type SheetsAdapter = Adapter & {
  writeAll(table: CylinderTable): Promise<void>
}

const DEFAULT_BASE_URL = 'https://sheets.googleapis.com/v4'

const READ_PARAMS = {
  valueRenderOption: 'UNFORMATTED_VALUE',
  dateTimeRenderOption: 'SERIAL_NUMBER',
}

const valueRangeSchema = z.object({
  range: z.string().optional(),
  majorDimension: z.string().optional(),
  values: z.array(z.array(z.unknown())).optional(),
})

type Grid = readonly (readonly unknown[])[]

/** `next` extended with blank cells so it overwrites every cell of `previous` */
export function coverGrid(next: string[][], previous: Grid): string[][] {
  const width = Math.max(0, ...next.map((r) => r.length), ...previous.map((r) => r.length))
  const height = Math.max(next.length, previous.length)
  return Array.from({ length: height }, (_, i) => {
    const row = next[i] ?? []
    return [...row, ...Array<string>(width - row.length).fill('')]
  })
}

export function createSheetsAdapter(options: SheetsAdapterOptions): SheetsAdapter {
  const name = 'sheets'
  const range = options.range ?? 'Sheet1'
  const doFetch = options.fetch ?? fetch
  const base = `${options.baseUrl ?? DEFAULT_BASE_URL}/spreadsheets/${encodeURIComponent(options.spreadsheetId)}/values/${encodeURIComponent(range)}`

  function url(suffix: string, params: Record<string, string> = {}): string {
    const search = new URLSearchParams(params)
    if (options.apiKey && !options.accessToken) search.set('key', options.apiKey)
    const query = search.toString()
    return `${base}${suffix}${query ? `?${query}` : ''}`
  }

  function headers(): Record<string, string> {
    const h: Record<string, string> = { 'Content-Type': 'application/json' }
    if (options.accessToken) h['Authorization'] = `Bearer ${options.accessToken}`
    return h
  }

  async function send(target: string, init: RequestInit, context: string): Promise<Response> {
    let res: Response
    try {
      res = await doFetch(target, { ...init, headers: headers() })
    } catch (e) {
      throw new StoreUnavailableError(`Cannot reach ${name} (${context})`, { cause: e })
    }
    if (res.ok) return res
    if ((res.status === 401 || res.status === 403) && init.method !== 'GET') {
      throw new StoreReadOnlyError(`${name} rejected write (${context}): HTTP ${res.status}`)
    }
    throw new StoreUnavailableError(`${name} request failed (${context}): HTTP ${res.status}`)
  }

  async function readGrid(context: string): Promise<Grid> {
    const res = await send(url('', READ_PARAMS), { method: 'GET' }, context)
    let body: unknown
    try {
      body = await res.json()
    } catch (e) {
      throw new StoreUnavailableError(`Malformed response from ${name}`, { cause: e })
    }
    const parsed = valueRangeSchema.safeParse(body)
    if (!parsed.success) {
      throw new StoreUnavailableError(`Malformed response from ${name}: ${parsed.error.message}`)
    }
    return parsed.data.values ?? []
  }

  return {
    name,

    async readAll() {
      return fromGrid(await readGrid('read'))
    },

    async writeAll(table) {
      assertWritable(name, options.readOnly)
      if (!options.accessToken) {
        throw new StoreReadOnlyError(`${name} store has no access token; writes are disabled`)
      }
      const previous = await readGrid('write')
      await send(
        url('', { valueInputOption: 'RAW' }),
        {
          method: 'PUT',
          body: JSON.stringify({ range, majorDimension: 'ROWS', values: coverGrid(toGrid(table), previous) }),
        },
        'write',
      )
    },
  }
}

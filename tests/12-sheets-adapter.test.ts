/**
 * Segment 12: Sheets Adapter Tests
 *
 * The Sheets values API is answered by a recording fetch stand-in.
 */
import { describe, it, expect } from 'vitest'
import { coverGrid, createSheetsAdapter } from '../src/sheets-adapter'
import { StoreReadOnlyError, StoreUnavailableError } from '../src/errors'
import { normalizeRow, toGrid } from '../src/table-codec'
import { fakeSheet, recordingFetch, jsonResponse } from './helpers/fake-http'
import { NOW, makeRecord } from './helpers/records'

const BASE = 'https://sheets.googleapis.com/v4/spreadsheets/sheet-123/values'
const UNFORMATTED = 'valueRenderOption=UNFORMATTED_VALUE&dateTimeRenderOption=SERIAL_NUMBER'
const BLANK_ROW = Array<string>(10).fill('')

const GRID = [
  ['Cylinder_ID', 'Capacity_kg', 'Fill_Percent', 'Status', 'Location_PIN'],
  ['LEO-1', '14', '40', 'Active', '500033'],
  [],
  ['LEO-2', '19'],
]

describe('Segment 12: Sheets Adapter', () => {
  describe('readAll', () => {
    it('reads the grid with an API key', async () => {
      const http = recordingFetch(() => jsonResponse({ range: 'Sheet1!A1:E4', majorDimension: 'ROWS', values: GRID }))
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })

      const rows = await adapter.readAll()

      expect(http.requests[0]?.url).toBe(`${BASE}/Sheet1?${UNFORMATTED}&key=test-key`)
      expect(http.requests[0]?.method).toBe('GET')
      expect(rows).toEqual([
        { Cylinder_ID: 'LEO-1', Capacity_kg: '14', Fill_Percent: '40', Status: 'Active', Location_PIN: '500033' },
        { Cylinder_ID: 'LEO-2', Capacity_kg: '19', Fill_Percent: null, Status: null, Location_PIN: null },
      ])
    })

    it('sends a bearer token instead of the key when it has one', async () => {
      const http = recordingFetch(() => jsonResponse({ values: GRID }))
      const adapter = createSheetsAdapter({
        spreadsheetId: 'sheet-123',
        range: 'Stock!A1:J',
        apiKey: 'test-key',
        accessToken: 'test-token',
        fetch: http.fetch,
      })
      await adapter.readAll()
      expect(http.requests[0]?.url).toBe(`${BASE}/Stock!A1%3AJ?${UNFORMATTED}`)
      expect(http.requests[0]?.headers.get('authorization')).toBe('Bearer test-token')
    })

    it('turns serial dates and numeric cells into record fields', async () => {
      const http = recordingFetch(() =>
        jsonResponse({
          values: [
            ['Cylinder_ID', 'Location_PIN', 'Fill_Percent', 'Last_Test_Date', 'Next_Test_Due'],
            ['A', 500033, 75, 43475, 45300],
          ],
        }),
      )
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })
      const [row] = await adapter.readAll()
      const record = normalizeRow(row ?? {}, NOW)
      expect(record).toMatchObject({
        Location_PIN: '500033',
        Fill_Percent: 75,
        Last_Test_Date: '2019-01-10',
        Next_Test_Due: '2024-01-09',
        Overdue: true,
      })
    })

    it('still reads dates left as month-first text', async () => {
      const http = recordingFetch(() =>
        jsonResponse({
          values: [
            ['Cylinder_ID', 'Location_PIN', 'Last_Test_Date', 'Next_Test_Due'],
            ['A', '500033', '1/10/2019', '1/9/2024'],
          ],
        }),
      )
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })
      const [row] = await adapter.readAll()
      expect(normalizeRow(row ?? {}, NOW)).toMatchObject({
        Last_Test_Date: '2019-01-10',
        Next_Test_Due: '2024-01-09',
        Overdue: true,
      })
    })

    it('reads an empty sheet as an empty table', async () => {
      const http = recordingFetch(() => jsonResponse({ range: 'Sheet1!A1:Z1000', majorDimension: 'ROWS' }))
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })
      expect(await adapter.readAll()).toEqual([])
    })

    it('reports an HTTP failure as unavailable', async () => {
      const http = recordingFetch(() => jsonResponse({ error: { code: 403 } }, 403))
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })
      const read = adapter.readAll()
      await expect(read).rejects.toBeInstanceOf(StoreUnavailableError)
      await expect(read).rejects.toThrow('sheets request failed (read): HTTP 403')
    })

    it('reports a network failure as unavailable', async () => {
      const http = recordingFetch(() => {
        throw new TypeError('fetch failed')
      })
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })
      await expect(adapter.readAll()).rejects.toThrow('Cannot reach sheets (read)')
    })

    it('rejects a malformed body', async () => {
      const http = recordingFetch(() => jsonResponse({ values: 'nope' }))
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })
      await expect(adapter.readAll()).rejects.toBeInstanceOf(StoreUnavailableError)
    })
  })

  describe('writeAll', () => {
    it('writes the whole grid in one PUT, blanking rows the table no longer fills', async () => {
      const http = recordingFetch((req) => jsonResponse(req.method === 'GET' ? { values: GRID } : {}))
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', accessToken: 'test-token', fetch: http.fetch })
      const table = [makeRecord({ Cylinder_ID: 'A' })]

      await adapter.writeAll(table)

      expect(http.requests.map((r) => [r.method, r.url])).toEqual([
        ['GET', `${BASE}/Sheet1?${UNFORMATTED}`],
        ['PUT', `${BASE}/Sheet1?valueInputOption=RAW`],
      ])
      expect(JSON.parse(http.requests[1]?.body ?? '')).toEqual({
        range: 'Sheet1',
        majorDimension: 'ROWS',
        values: [...toGrid(table), BLANK_ROW, BLANK_ROW],
      })
    })

    it('leaves the sheet as it was when the PUT fails', async () => {
      const sheet = fakeSheet(GRID, { putStatus: 503 })
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', accessToken: 'test-token', fetch: sheet.fetch })

      const write = adapter.writeAll([makeRecord({ Cylinder_ID: 'A' })])

      await expect(write).rejects.toBeInstanceOf(StoreUnavailableError)
      await expect(write).rejects.toThrow('sheets request failed (write): HTTP 503')
      expect(sheet.requests.map((r) => r.method)).toEqual(['GET', 'PUT'])
      expect(sheet.grid()).toEqual(GRID)
    })

    it('writes nothing when the current grid cannot be read', async () => {
      const sheet = fakeSheet(GRID, { failReads: 1 })
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', accessToken: 'test-token', fetch: sheet.fetch })
      await expect(adapter.writeAll([])).rejects.toThrow('sheets request failed (write): HTTP 503')
      expect(sheet.requests.map((r) => r.method)).toEqual(['GET'])
      expect(sheet.grid()).toEqual(GRID)
    })

    it('replaces a longer sheet with a shorter table', async () => {
      const sheet = fakeSheet(GRID)
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', accessToken: 'test-token', fetch: sheet.fetch })
      await adapter.writeAll([makeRecord({ Cylinder_ID: 'A' })])
      expect(sheet.ids()).toEqual(['A'])
      expect(await adapter.readAll()).toHaveLength(1)
    })

    it('refuses to write with only an API key', async () => {
      const http = recordingFetch(() => jsonResponse({}))
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', apiKey: 'test-key', fetch: http.fetch })
      await expect(adapter.writeAll([])).rejects.toThrow('sheets store has no access token; writes are disabled')
      expect(http.requests).toHaveLength(0)
    })

    it('maps a forbidden write to read-only', async () => {
      const http = recordingFetch((req) =>
        req.method === 'PUT' ? jsonResponse({ error: { code: 403 } }, 403) : jsonResponse({ values: [] }),
      )
      const adapter = createSheetsAdapter({ spreadsheetId: 'sheet-123', accessToken: 'test-token', fetch: http.fetch })
      const write = adapter.writeAll([])
      await expect(write).rejects.toBeInstanceOf(StoreReadOnlyError)
      await expect(write).rejects.toThrow('sheets rejected write (write): HTTP 403')
      expect(http.requests).toHaveLength(2)
    })

    it('pads ragged rows to the widest row', () => {
      expect(coverGrid([['a', 'b']], [['x'], ['x', 'y', 'z']])).toEqual([
        ['a', 'b', ''],
        ['', '', ''],
      ])
    })

    it('refuses writes when read-only', async () => {
      const http = recordingFetch(() => jsonResponse({}))
      const adapter = createSheetsAdapter({
        spreadsheetId: 'sheet-123',
        accessToken: 'test-token',
        readOnly: true,
        fetch: http.fetch,
      })
      await expect(adapter.writeAll([])).rejects.toThrow('sheets store is read-only')
    })
  })
})

/**
 * Segment 11: Supabase Adapter Tests
 *
 * A real Supabase client talks to an in-process PostgREST stand-in through
 * its `global.fetch` option.
 */
import { describe, it, expect } from 'vitest'
import { createClient } from '@supabase/supabase-js'
import { createSupabaseAdapter } from '../src/supabase-adapter'
import { capabilitiesOf } from '../src/adapter'
import {
  DuplicateIdError,
  RecordNotFoundError,
  StoreReadOnlyError,
  StoreUnavailableError,
} from '../src/errors'
import { createMutationCoordinator } from '../src/mutations'
import { createTableLoader } from '../src/table-loader'
import { fakePostgrest, recordingFetch, jsonResponse, type FakePostgrestOptions } from './helpers/fake-http'
import { date, fixedClock, makeRecord, quiet, sampleRows } from './helpers/records'

function clientFor(fetchFn: typeof fetch) {
  return createClient('http://localhost:54321', 'test-key', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fetchFn },
  })
}

function setup(options: FakePostgrestOptions & { readOnly?: boolean } = {}) {
  const server = fakePostgrest(sampleRows(), options)
  const adapter = createSupabaseAdapter(clientFor(server.fetch), { table: options.table, readOnly: options.readOnly })
  return { server, adapter }
}

describe('Segment 11: Supabase Adapter', () => {
  it('supports row update and insert but no full replace', () => {
    const { adapter } = setup()
    expect(capabilitiesOf(adapter)).toEqual({ writeRow: true, appendRow: true, writeAll: false })
  })

  it('reads every row of the table', async () => {
    const { server, adapter } = setup()
    const rows = await adapter.readAll()
    expect(rows.map((r) => r['Cylinder_ID'])).toEqual(['LEO-1', 'LEO-2', 'LEO-3'])
    const select = server.requests.find((r) => r.url.includes('/rest/v1/'))
    expect(select?.method).toBe('GET')
    expect(new URL(select?.url ?? '').searchParams.get('select')).toBe('*')
  })

  it('uses a configured table name', async () => {
    const { adapter } = setup({ table: 'depot_stock' })
    expect(await adapter.readAll()).toHaveLength(3)
  })

  it('updates one row filtered by id', async () => {
    const { server, adapter } = setup()
    await adapter.writeRow('LEO-2', { Fill_Percent: 100, Last_Fill_Date: date('2026-10-19') })
    const patch = server.requests.find((r) => r.method === 'PATCH')
    expect(new URL(patch?.url ?? '').searchParams.get('Cylinder_ID')).toBe('eq.LEO-2')
    expect(JSON.parse(patch?.body ?? '')).toEqual({ Fill_Percent: 100, Last_Fill_Date: '2026-10-19' })
    expect(server.rows()[1]).toEqual(expect.objectContaining({ Fill_Percent: 100, Last_Fill_Date: '2026-10-19' }))
  })

  it('reports an update that matched nothing', async () => {
    const { adapter } = setup()
    await expect(adapter.writeRow('LEO-9', { Fill_Percent: 1 })).rejects.toBeInstanceOf(RecordNotFoundError)
  })

  it('inserts a new row', async () => {
    const { server, adapter } = setup()
    await adapter.appendRow(makeRecord({ Cylinder_ID: 'LEO-4' }))
    expect(server.rows().map((r) => r['Cylinder_ID'])).toEqual(['LEO-1', 'LEO-2', 'LEO-3', 'LEO-4'])
  })

  it('maps a unique violation to a duplicate id', async () => {
    const { server, adapter } = setup()
    const insert = adapter.appendRow(makeRecord({ Cylinder_ID: 'LEO-1' }))
    await expect(insert).rejects.toBeInstanceOf(DuplicateIdError)
    expect(server.rows()).toHaveLength(3)
  })

  it('maps a rejected write to read-only', async () => {
    const { adapter } = setup({ writeStatus: 401 })
    const update = adapter.writeRow('LEO-1', { Fill_Percent: 1 })
    await expect(update).rejects.toBeInstanceOf(StoreReadOnlyError)
    await expect(update).rejects.toThrow("supabase rejected write (update 'LEO-1'): permission denied")
  })

  it('maps a server error to unavailable', async () => {
    const { adapter } = setup({ writeStatus: 500 })
    await expect(adapter.appendRow(makeRecord({ Cylinder_ID: 'LEO-4' }))).rejects.toBeInstanceOf(StoreUnavailableError)
  })

  it('reports a failed read as unavailable', async () => {
    const { fetch } = recordingFetch(() => jsonResponse({ message: 'service unavailable' }, 503))
    const adapter = createSupabaseAdapter(clientFor(fetch))
    await expect(adapter.readAll()).rejects.toThrow("Cannot read supabase table 'cylinders': service unavailable")
  })

  it('refuses writes when read-only without calling the server', async () => {
    const { server, adapter } = setup({ readOnly: true })
    await expect(adapter.appendRow(makeRecord({ Cylinder_ID: 'LEO-4' }))).rejects.toBeInstanceOf(StoreReadOnlyError)
    expect(server.requests.some((r) => r.method === 'POST')).toBe(false)
    expect(server.rows()).toHaveLength(3)
  })

  it('drives a return through the coordinator', async () => {
    const { server, adapter } = setup()
    const clock = fixedClock()
    const loader = createTableLoader({ adapter, clock, ...quiet })
    const coordinator = createMutationCoordinator({ adapter, loader, clock, ...quiet })

    const { table } = await loader.load()
    const outcome = await coordinator.applyReturn(table, 'LEO-2', 'Good')

    expect(outcome.status === 'persisted' && outcome.liability).toBe(1000)
    expect(server.rows()[1]).toEqual(expect.objectContaining({ Status: 'Empty', Fill_Percent: 0 }))
  })
})

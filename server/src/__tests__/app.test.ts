import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Server } from 'node:http'
import { createApp } from '../app'
import { DailyLogService } from '../dailyLogService'
import { SpreadsheetClient } from '../sheets/spreadsheetClient'
import { MemorySpreadsheetGateway } from '../sheets/memoryGateway'
import { MemoryStagingStore } from '../staging'

class OfflineGateway extends MemorySpreadsheetGateway {
  async findSpreadsheet(): Promise<string | null> {
    throw new Error('network down')
  }
}

function buildService(gateway: MemorySpreadsheetGateway) {
  return new DailyLogService(new SpreadsheetClient(gateway), new MemoryStagingStore(), {
    spreadsheetName: 'Daily Activity Log',
    timeZone: 'UTC',
    now: () => new Date('2024-03-01T09:30:00Z'),
  })
}

async function listen(service: DailyLogService): Promise<{ server: Server; baseUrl: string }> {
  const server = createApp(service).listen(0, '127.0.0.1')
  await new Promise<void>((resolve) => server.once('listening', resolve))
  const address = server.address()
  if (!address || typeof address === 'string') throw new Error('no port')
  return { server, baseUrl: `http://127.0.0.1:${address.port}` }
}

const entry = {
  date: '2024-03-01',
  satisfaction: 4,
  neuralgia: 1,
  exercise1: { type: 'Run', minutes: 30, miles: 3 },
  insights: 'ok',
}

describe('HTTP API', () => {
  let server: Server
  let baseUrl: string

  function request(path: string, init: { method?: string; body?: string; headers?: Record<string, string> } = {}) {
    return fetch(`${baseUrl}${path}`, {
      ...init,
      headers: { 'Content-Type': 'application/json', 'x-session-id': 'browser-1', ...init.headers },
    })
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    ;({ server, baseUrl } = await listen(buildService(new MemorySpreadsheetGateway())))
  })

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()))
  })

  it('answers the health check', async () => {
    const res = await request('/api/health')
    expect(await res.json()).toEqual({ ok: true })
  })

  it('returns no rows before anything was saved', async () => {
    const res = await request('/api/entries')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ rows: [] })
  })

  it('stages an activity for the session', async () => {
    const res = await request('/api/staging', {
      method: 'POST',
      body: JSON.stringify({ type: 'Walk', minutes: 20, notes: ' park ' }),
    })
    expect(res.status).toBe(201)
    expect(await res.json()).toEqual({ activities: [{ type: 'Walk', minutes: 20, notes: 'park' }] })

    const other = await request('/api/staging', { headers: { 'x-session-id': 'browser-2' } })
    expect(await other.json()).toEqual({ activities: [] })
  })

  it('refuses to stage the None type', async () => {
    const res = await request('/api/staging', {
      method: 'POST',
      body: JSON.stringify({ type: 'None', minutes: 20 }),
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Pick an activity type before adding it.' })
  })

  it('rejects an out-of-range rating', async () => {
    const res = await request('/api/entries', {
      method: 'POST',
      body: JSON.stringify({ ...entry, satisfaction: 7 }),
    })
    expect(res.status).toBe(400)
    const body: { error: string } = await res.json()
    expect(body.error).toMatch(/^satisfaction: /)
  })

  it('rejects a body that is not JSON', async () => {
    const res = await request('/api/entries', { method: 'POST', body: '{nope' })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Request body is not valid JSON' })
  })

  it('saves an entry with the staged activities and empties the list', async () => {
    await request('/api/staging', {
      method: 'POST',
      body: JSON.stringify({ type: 'Gardening', minutes: 45, notes: 'weeding' }),
    })

    const res = await request('/api/entries', { method: 'POST', body: JSON.stringify(entry) })
    expect(res.status).toBe(201)
    const body: { ok: boolean; row: unknown[]; folded: number } = await res.json()
    expect(body.ok).toBe(true)
    expect(body.folded).toBe(1)
    expect(body.row).toHaveLength(41)
    expect(body.row.slice(0, 12)).toEqual(['2024-03-01', 4, 1, 'Run', 30, 3, 'None', 0, 0, 'Gardening', 45, 'weeding'])
    expect(body.row.slice(-2)).toEqual(['ok', '2024-03-01 09:30:00'])

    const staged = await request('/api/staging')
    expect(await staged.json()).toEqual({ activities: [] })

    const entries: { rows: unknown[][] } = await (await request('/api/entries')).json()
    expect(entries.rows).toHaveLength(2)
    expect(entries.rows[1]).toEqual(body.row)
  })

  it('clears the list', async () => {
    await request('/api/staging', { method: 'POST', body: JSON.stringify({ type: 'Walk', minutes: 5 }) })
    const res = await request('/api/staging', { method: 'DELETE' })
    expect(await res.json()).toEqual({ activities: [] })
    expect(await (await request('/api/staging')).json()).toEqual({ activities: [] })
  })

  it('reports spreadsheet failures as a connection error', async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()))
    ;({ server, baseUrl } = await listen(buildService(new OfflineGateway())))

    const res = await request('/api/entries')
    expect(res.status).toBe(502)
    expect(await res.json()).toEqual({
      error: 'Google Sheets Connection Error: Could not open spreadsheet: network down',
    })
  })
})

import { describe, it, expect, beforeEach } from 'vitest'
import { DailyLogService } from '../dailyLogService'
import { SpreadsheetClient } from '../sheets/spreadsheetClient'
import { MemorySpreadsheetGateway } from '../sheets/memoryGateway'
import { a1 } from '../sheets/range'
import { MemoryStagingStore, SheetStagingStore } from '../staging'
import { LOG_HEADERS, type DailyLogForm } from '../../../shared/dailyLog'

const session = { sessionId: 'test-session' }

const form: DailyLogForm = {
  date: '2024-03-01',
  satisfaction: 4,
  neuralgia: 1,
  exercise1: { type: 'Run', minutes: 30, miles: 3.0 },
  exercise2: { type: 'None', minutes: 0, miles: 0 },
  insights: 'ok',
}

const EMPTY_SLOTS = Array.from({ length: 10 }, () => ['None', 0, '']).flat()

describe('DailyLogService', () => {
  let service: DailyLogService

  beforeEach(() => {
    const client = new SpreadsheetClient(new MemorySpreadsheetGateway(), { serviceAccountEmail: 'logger@test.local' })
    service = new DailyLogService(client, new MemoryStagingStore(), {
      spreadsheetName: 'Daily Activity Log',
      timeZone: 'America/New_York',
      now: () => new Date('2024-03-01T13:00:00Z'),
    })
  })

  it('returns no rows before the first entry', async () => {
    expect(await service.readEntries()).toEqual([])
  })

  it('persists the submitted values plus a timestamp', async () => {
    const result = await service.submitEntry(session, form)

    const expected = ['2024-03-01', 4, 1, 'Run', 30, 3, 'None', 0, 0, ...EMPTY_SLOTS, 'ok', '2024-03-01 08:00:00']
    expect(result).toEqual({ row: expected, folded: 0 })
    expect(await service.readEntries()).toEqual([[...LOG_HEADERS], expected])
  })

  it('folds staged activities into the row and clears the list', async () => {
    await service.addActivity(session, { type: 'Walk', minutes: 20, notes: 'park' })
    await service.addActivity(session, { type: 'Meditation', minutes: 10, notes: '' })

    const { row, folded } = await service.submitEntry(session, form)

    expect(folded).toBe(2)
    expect(row.slice(9, 18)).toEqual(['Walk', 20, 'park', 'Meditation', 10, '', 'None', 0, ''])
    expect(await service.listActivities(session)).toEqual([])
  })

  it('leaves other sessions staged activities alone', async () => {
    const other = { sessionId: 'other-session' }
    await service.addActivity(other, { type: 'Reading', minutes: 15, notes: '' })

    await service.submitEntry(session, form)

    expect(await service.listActivities(other)).toEqual([{ type: 'Reading', minutes: 15, notes: '' }])
  })

  it('clears three staged activities on request', async () => {
    await service.addActivity(session, { type: 'Walk', minutes: 20, notes: '' })
    await service.addActivity(session, { type: 'Reading', minutes: 15, notes: '' })
    await service.addActivity(session, { type: 'Housework', minutes: 40, notes: 'kitchen' })

    await service.clearActivities(session)

    expect(await service.listActivities(session)).toEqual([])
  })

  it('appends a second entry for the same date', async () => {
    await service.submitEntry(session, form)
    await service.submitEntry(session, { ...form, satisfaction: 2 })

    const rows = await service.readEntries()
    expect(rows).toHaveLength(3)
    expect(rows.map((r) => r[1])).toEqual(['Satisfaction', 4, 2])
  })
})

describe('DailyLogService with sheet staging', () => {
  it('loads entries and staged activities together from an older spreadsheet', async () => {
    const gateway = new MemorySpreadsheetGateway()
    const id = await gateway.createSpreadsheet('Daily Activity Log')
    await gateway.appendValues(id, a1('Sheet1', 'A1'), [[...LOG_HEADERS]])
    const client = new SpreadsheetClient(gateway)
    const staging = new SheetStagingStore(client, () => client.ensureSpreadsheet('Daily Activity Log'))
    const service = new DailyLogService(client, staging, {
      spreadsheetName: 'Daily Activity Log',
      timeZone: 'America/New_York',
    })

    const [entries, activities] = await Promise.all([service.readEntries(), service.listActivities(session)])

    expect(entries).toEqual([[...LOG_HEADERS]])
    expect(activities).toEqual([])
    expect(await gateway.listTabs(id)).toEqual(['Sheet1', 'Temp_Activities'])
  })
})

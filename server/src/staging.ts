import {
  ACTIVITY_TYPES,
  MAX_ACTIVITY_SLOTS,
  SENTINEL_TYPE,
  STAGING_CLEAR_RANGE,
  type ActivityType,
  type CellValue,
  type StagedActivity,
} from '../../shared/dailyLog'
import { StagingError } from './errors'
import type { SessionContext } from './session'
import { a1 } from './sheets/range'
import type { SpreadsheetClient, SpreadsheetHandle } from './sheets/spreadsheetClient'

/** Activities added one at a time before the day's entry is submitted. */
export interface StagingStore {
  list(session: SessionContext): Promise<StagedActivity[]>
  add(session: SessionContext, activity: StagedActivity): Promise<StagedActivity[]>
  clear(session: SessionContext): Promise<void>
}

function checkAddable(current: readonly StagedActivity[], activity: StagedActivity): void {
  if (activity.type === SENTINEL_TYPE) {
    throw new StagingError('Pick an activity type before adding it.')
  }
  if (current.length >= MAX_ACTIVITY_SLOTS) {
    throw new StagingError(`Daily activity list is full (${MAX_ACTIVITY_SLOTS} max). Save or clear it first.`)
  }
}

export interface MemoryStagingOptions {
  /** Sessions kept at once; the least recently used is dropped past this */
  maxSessions?: number
  /** A session untouched for this long is forgotten */
  idleMs?: number
  now?: () => number
}

interface SessionList {
  activities: StagedActivity[]
  touchedAt: number
}

export class MemoryStagingStore implements StagingStore {
  // Insertion order doubles as recency order
  private readonly lists = new Map<string, SessionList>()
  private readonly maxSessions: number
  private readonly idleMs: number
  private readonly now: () => number

  constructor(options: MemoryStagingOptions = {}) {
    this.maxSessions = options.maxSessions ?? 1000
    this.idleMs = options.idleMs ?? 12 * 60 * 60 * 1000
    this.now = options.now ?? Date.now
  }

  async list(session: SessionContext): Promise<StagedActivity[]> {
    return [...(this.current(session.sessionId) ?? [])]
  }

  async add(session: SessionContext, activity: StagedActivity): Promise<StagedActivity[]> {
    const current = this.current(session.sessionId) ?? []
    checkAddable(current, activity)
    const next = [...current, { ...activity }]
    this.lists.delete(session.sessionId)
    this.lists.set(session.sessionId, { activities: next, touchedAt: this.now() })
    this.evict()
    return [...next]
  }

  async clear(session: SessionContext): Promise<void> {
    this.lists.delete(session.sessionId)
  }

  get sessionCount(): number {
    return this.lists.size
  }

  private current(sessionId: string): StagedActivity[] | undefined {
    this.evict()
    return this.lists.get(sessionId)?.activities
  }

  private evict(): void {
    const cutoff = this.now() - this.idleMs
    for (const [id, entry] of this.lists) {
      if (entry.touchedAt <= cutoff || this.lists.size > this.maxSessions) {
        this.lists.delete(id)
      } else {
        break
      }
    }
  }
}

function asActivityType(value: string): ActivityType | undefined {
  return ACTIVITY_TYPES.find((t) => t === value)
}

function toStagedActivity(row: CellValue[]): StagedActivity | null {
  const [type = '', minutes = 0, notes = ''] = row
  const name = asActivityType(String(type))
  if (!name) return null
  const mins = typeof minutes === 'number' ? minutes : Number(minutes)
  return { type: name, minutes: Number.isFinite(mins) ? mins : 0, notes: String(notes) }
}

/**
 * Pending activities kept on the Temp_Activities tab. The tab is shared by
 * every session; the session argument is ignored.
 */
export class SheetStagingStore implements StagingStore {
  constructor(
    private readonly client: SpreadsheetClient,
    private readonly resolveHandle: () => Promise<SpreadsheetHandle>
  ) {}

  async list(_session: SessionContext): Promise<StagedActivity[]> {
    const handle = await this.resolveHandle()
    const rows = await this.client.readAll(handle, handle.stagingTab)
    return rows
      .slice(1)
      .map(toStagedActivity)
      .filter((a): a is StagedActivity => a !== null)
  }

  async add(session: SessionContext, activity: StagedActivity): Promise<StagedActivity[]> {
    const current = await this.list(session)
    checkAddable(current, activity)
    const handle = await this.resolveHandle()
    await this.client.appendRow(handle, handle.stagingTab, [activity.type, activity.minutes, activity.notes])
    return [...current, { ...activity }]
  }

  async clear(_session: SessionContext): Promise<void> {
    const handle = await this.resolveHandle()
    await this.client.clearRange(handle, a1(handle.stagingTab, STAGING_CLEAR_RANGE))
  }
}

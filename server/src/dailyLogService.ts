import {
  MAX_ACTIVITY_SLOTS,
  type CellValue,
  type DailyLogForm,
  type StagedActivity,
} from '../../shared/dailyLog'
import { assembleRow, formatTimestamp } from './entryAssembler'
import { SpreadsheetNotFoundError } from './errors'
import type { SessionContext } from './session'
import type { SpreadsheetClient, SpreadsheetHandle } from './sheets/spreadsheetClient'
import type { StagingStore } from './staging'

export interface DailyLogServiceOptions {
  spreadsheetName: string
  timeZone: string
  now?: () => Date
}

export interface SubmitResult {
  row: CellValue[]
  /** How many staged activities went into the row */
  folded: number
}

export class DailyLogService {
  private readonly now: () => Date

  constructor(
    private readonly client: SpreadsheetClient,
    private readonly staging: StagingStore,
    private readonly options: DailyLogServiceOptions
  ) {
    this.now = options.now ?? (() => new Date())
  }

  ensureSpreadsheet(): Promise<SpreadsheetHandle> {
    return this.client.ensureSpreadsheet(this.options.spreadsheetName)
  }

  async submitEntry(session: SessionContext, form: DailyLogForm): Promise<SubmitResult> {
    const handle = await this.ensureSpreadsheet()
    const staged = await this.staging.list(session)
    const row = assembleRow(form, staged, formatTimestamp(this.now(), this.options.timeZone))
    await this.client.appendRow(handle, handle.logTab, row)
    await this.staging.clear(session)
    return { row, folded: Math.min(staged.length, MAX_ACTIVITY_SLOTS) }
  }

  /** Header plus every logged row; [] before the first entry was ever saved. */
  async readEntries(): Promise<CellValue[][]> {
    let handle: SpreadsheetHandle
    try {
      handle = await this.client.open(this.options.spreadsheetName)
    } catch (e) {
      if (e instanceof SpreadsheetNotFoundError) return []
      throw e
    }
    return this.client.readAll(handle, handle.logTab)
  }

  listActivities(session: SessionContext): Promise<StagedActivity[]> {
    return this.staging.list(session)
  }

  addActivity(session: SessionContext, activity: StagedActivity): Promise<StagedActivity[]> {
    return this.staging.add(session, activity)
  }

  clearActivities(session: SessionContext): Promise<void> {
    return this.staging.clear(session)
  }
}

import {
  LOG_HEADERS,
  STAGING_HEADERS,
  STAGING_TAB_NAME,
  type CellValue,
} from '../../../shared/dailyLog'
import { ConnectionError, SpreadsheetNotFoundError, errorMessage } from '../errors'
import type { SpreadsheetGateway } from './gateway'
import { a1 } from './range'

export interface SpreadsheetHandle {
  spreadsheetId: string
  /** First tab: the append-only daily log */
  logTab: string
  stagingTab: string
}

export interface SpreadsheetClientOptions {
  /** Identity granted writer access on spreadsheets this client creates */
  serviceAccountEmail?: string
  folderId?: string
  stagingTab?: string
}

export class SpreadsheetClient {
  private readonly stagingTab: string

  constructor(
    private readonly gateway: SpreadsheetGateway,
    private readonly options: SpreadsheetClientOptions = {}
  ) {
    this.stagingTab = options.stagingTab ?? STAGING_TAB_NAME
  }

  /** Opens an existing spreadsheet without writing to it. */
  async open(name: string): Promise<SpreadsheetHandle> {
    const { spreadsheetId, tabs } = await this.locate(name)
    return this.handle(spreadsheetId, tabs)
  }

  /**
   * Opens the spreadsheet, creating it with its header rows when absent and
   * adding the staging tab to one that predates it.
   */
  async ensureSpreadsheet(name: string): Promise<SpreadsheetHandle> {
    let found: { spreadsheetId: string; tabs: string[] }
    try {
      found = await this.locate(name)
    } catch (e) {
      if (!(e instanceof SpreadsheetNotFoundError)) throw e
      return this.create(name)
    }
    if (!found.tabs.includes(this.stagingTab)) {
      await this.createStagingTab(found.spreadsheetId)
    }
    return this.handle(found.spreadsheetId, found.tabs)
  }

  async appendRow(handle: SpreadsheetHandle, tab: string, values: CellValue[]): Promise<void> {
    await this.call('append row', () =>
      this.gateway.appendValues(handle.spreadsheetId, a1(tab, 'A1'), [values])
    )
  }

  /** All rows including the header; [] when the tab holds nothing yet. */
  async readAll(handle: SpreadsheetHandle, tab: string): Promise<CellValue[][]> {
    return this.call('read rows', () => this.gateway.getValues(handle.spreadsheetId, a1(tab)))
  }

  async clearRange(handle: SpreadsheetHandle, range: string): Promise<void> {
    await this.call('clear range', () => this.gateway.clearValues(handle.spreadsheetId, range))
  }

  private async create(name: string): Promise<SpreadsheetHandle> {
    const { folderId, serviceAccountEmail } = this.options
    const spreadsheetId = await this.call('create spreadsheet', () =>
      this.gateway.createSpreadsheet(name, folderId)
    )
    if (serviceAccountEmail) {
      await this.call('share spreadsheet', () =>
        this.gateway.shareWith(spreadsheetId, serviceAccountEmail)
      )
    }

    const tabs = await this.call('list tabs', () => this.gateway.listTabs(spreadsheetId))
    const logTab = tabs[0] ?? 'Sheet1'
    await this.call('write header', () =>
      this.gateway.appendValues(spreadsheetId, a1(logTab, 'A1'), [[...LOG_HEADERS]])
    )
    await this.createStagingTab(spreadsheetId)
    return { spreadsheetId, logTab, stagingTab: this.stagingTab }
  }

  private async locate(name: string): Promise<{ spreadsheetId: string; tabs: string[] }> {
    const spreadsheetId = await this.call('open spreadsheet', () => this.gateway.findSpreadsheet(name))
    if (!spreadsheetId) throw new SpreadsheetNotFoundError(name)
    const tabs = await this.call('list tabs', () => this.gateway.listTabs(spreadsheetId))
    return { spreadsheetId, tabs }
  }

  private handle(spreadsheetId: string, tabs: string[]): SpreadsheetHandle {
    return { spreadsheetId, logTab: tabs[0] ?? 'Sheet1', stagingTab: this.stagingTab }
  }

  private async createStagingTab(spreadsheetId: string): Promise<void> {
    try {
      await this.gateway.addTab(spreadsheetId, this.stagingTab)
    } catch (e) {
      // A concurrent request may have added it first; that one writes the header
      const tabs = await this.call('list tabs', () => this.gateway.listTabs(spreadsheetId))
      if (tabs.includes(this.stagingTab)) return
      throw new ConnectionError(`Could not add staging tab: ${errorMessage(e, 'request failed')}`, { cause: e })
    }
    await this.call('write staging header', () =>
      this.gateway.appendValues(spreadsheetId, a1(this.stagingTab, 'A1'), [[...STAGING_HEADERS]])
    )
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (e) {
      throw new ConnectionError(`Could not ${action}: ${errorMessage(e, 'request failed')}`, { cause: e })
    }
  }
}

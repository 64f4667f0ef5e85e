import type { CellValue } from '../../../shared/dailyLog'

/**
 * The calls the spreadsheet client needs from a spreadsheet backend.
 * Ranges are A1 notation with a quoted tab name, e.g. `'Sheet1'!A1`.
 */
export interface SpreadsheetGateway {
  /** Id of the first non-trashed spreadsheet with this exact name, or null. */
  findSpreadsheet(name: string): Promise<string | null>
  createSpreadsheet(name: string, folderId?: string): Promise<string>
  shareWith(spreadsheetId: string, email: string): Promise<void>
  /** Tab titles in display order. */
  listTabs(spreadsheetId: string): Promise<string[]>
  addTab(spreadsheetId: string, title: string): Promise<void>
  appendValues(spreadsheetId: string, range: string, rows: CellValue[][]): Promise<void>
  getValues(spreadsheetId: string, range: string): Promise<CellValue[][]>
  clearValues(spreadsheetId: string, range: string): Promise<void>
}

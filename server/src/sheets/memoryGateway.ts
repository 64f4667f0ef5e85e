import type { CellValue } from '../../../shared/dailyLog'
import type { SpreadsheetGateway } from './gateway'
import { parseRange } from './range'

interface MemorySpreadsheet {
  name: string
  folderId: string | null
  writers: string[]
  tabs: Map<string, CellValue[][]>
}

const DEFAULT_TAB = 'Sheet1'

function isBlank(cell: CellValue | undefined): boolean {
  return cell === undefined || cell === ''
}

function trimRow(row: CellValue[]): CellValue[] {
  let end = row.length
  while (end > 0 && isBlank(row[end - 1])) end--
  return row.slice(0, end)
}

// Mirrors what the Sheets API returns: no trailing blank cells or rows
function trimGrid(grid: CellValue[][]): CellValue[][] {
  const rows = grid.map(trimRow)
  let end = rows.length
  while (end > 0 && rows[end - 1].length === 0) end--
  return rows.slice(0, end)
}

/**
 * In-process spreadsheet backend. Used for local runs without Google
 * credentials (SHEETS_BACKEND=memory) and by the tests.
 */
export class MemorySpreadsheetGateway implements SpreadsheetGateway {
  private readonly spreadsheets = new Map<string, MemorySpreadsheet>()
  private nextId = 1

  async findSpreadsheet(name: string): Promise<string | null> {
    for (const [id, sheet] of this.spreadsheets) {
      if (sheet.name === name) return id
    }
    return null
  }

  async createSpreadsheet(name: string, folderId?: string): Promise<string> {
    const id = `memory-${this.nextId++}`
    this.spreadsheets.set(id, {
      name,
      folderId: folderId ?? null,
      writers: [],
      tabs: new Map([[DEFAULT_TAB, []]]),
    })
    return id
  }

  async shareWith(spreadsheetId: string, email: string): Promise<void> {
    const sheet = this.get(spreadsheetId)
    if (!sheet.writers.includes(email)) sheet.writers.push(email)
  }

  async listTabs(spreadsheetId: string): Promise<string[]> {
    return [...this.get(spreadsheetId).tabs.keys()]
  }

  async addTab(spreadsheetId: string, title: string): Promise<void> {
    const sheet = this.get(spreadsheetId)
    if (sheet.tabs.has(title)) throw new Error(`A sheet with the name "${title}" already exists`)
    sheet.tabs.set(title, [])
  }

  async appendValues(spreadsheetId: string, range: string, rows: CellValue[][]): Promise<void> {
    const grid = this.tab(spreadsheetId, parseRange(range).tab)
    const used = trimGrid(grid).length
    grid.splice(used, grid.length - used, ...rows.map((r) => [...r]))
  }

  async getValues(spreadsheetId: string, range: string): Promise<CellValue[][]> {
    const { tab, start, end } = parseRange(range)
    const grid = this.tab(spreadsheetId, tab)
    if (!start || !end) return trimGrid(grid)
    const window = grid
      .slice(start.row, end.row + 1)
      .map((row) => row.slice(start.col, end.col + 1))
    return trimGrid(window)
  }

  async clearValues(spreadsheetId: string, range: string): Promise<void> {
    const { tab, start, end } = parseRange(range)
    const grid = this.tab(spreadsheetId, tab)
    if (!start || !end) {
      grid.length = 0
      return
    }
    for (let r = start.row; r <= end.row && r < grid.length; r++) {
      const row = grid[r]
      for (let c = start.col; c <= end.col && c < row.length; c++) row[c] = ''
    }
  }

  /** Who was granted write access; for inspection. */
  writersOf(spreadsheetId: string): string[] {
    return [...this.get(spreadsheetId).writers]
  }

  folderOf(spreadsheetId: string): string | null {
    return this.get(spreadsheetId).folderId
  }

  private get(spreadsheetId: string): MemorySpreadsheet {
    const sheet = this.spreadsheets.get(spreadsheetId)
    if (!sheet) throw new Error(`Requested entity was not found: ${spreadsheetId}`)
    return sheet
  }

  private tab(spreadsheetId: string, title: string): CellValue[][] {
    const grid = this.get(spreadsheetId).tabs.get(title)
    if (!grid) throw new Error(`Unable to parse range: ${title}`)
    return grid
  }
}

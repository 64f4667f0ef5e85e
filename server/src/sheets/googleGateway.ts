import { google, type drive_v3, type sheets_v4 } from 'googleapis'
import type { CellValue } from '../../../shared/dailyLog'
import type { SpreadsheetGateway } from './gateway'

export interface ServiceAccountCredentials {
  client_email: string
  private_key: string
}

const SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
]

const SPREADSHEET_MIME = 'application/vnd.google-apps.spreadsheet'

function toCell(value: unknown): CellValue {
  if (typeof value === 'number' || typeof value === 'string') return value
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE'
  return ''
}

function escapeQuery(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")
}

/** Drive v3 + Sheets v4 behind a service-account identity. */
export class GoogleSheetsGateway implements SpreadsheetGateway {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly drive: drive_v3.Drive
  ) {}

  static fromServiceAccount(credentials: ServiceAccountCredentials): GoogleSheetsGateway {
    const auth = new google.auth.GoogleAuth({
      credentials: {
        client_email: credentials.client_email,
        private_key: credentials.private_key,
      },
      scopes: SCOPES,
    })
    return new GoogleSheetsGateway(
      google.sheets({ version: 'v4', auth }),
      google.drive({ version: 'v3', auth })
    )
  }

  async findSpreadsheet(name: string): Promise<string | null> {
    const res = await this.drive.files.list({
      q: `name = '${escapeQuery(name)}' and mimeType = '${SPREADSHEET_MIME}' and trashed = false`,
      fields: 'files(id, name)',
      pageSize: 1,
      supportsAllDrives: true,
      includeItemsFromAllDrives: true,
    })
    return res.data.files?.[0]?.id ?? null
  }

  async createSpreadsheet(name: string, folderId?: string): Promise<string> {
    const res = await this.drive.files.create({
      requestBody: {
        name,
        mimeType: SPREADSHEET_MIME,
        parents: folderId ? [folderId] : undefined,
      },
      fields: 'id',
      supportsAllDrives: true,
    })
    const id = res.data.id
    if (!id) throw new Error(`Drive did not return an id for "${name}"`)
    return id
  }

  async shareWith(spreadsheetId: string, email: string): Promise<void> {
    await this.drive.permissions.create({
      fileId: spreadsheetId,
      requestBody: { type: 'user', role: 'writer', emailAddress: email },
      sendNotificationEmail: false,
      supportsAllDrives: true,
    })
  }

  async listTabs(spreadsheetId: string): Promise<string[]> {
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: 'sheets.properties.title',
    })
    return (res.data.sheets ?? [])
      .map((s) => s.properties?.title)
      .filter((t): t is string => typeof t === 'string')
  }

  async addTab(spreadsheetId: string, title: string): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title } } }] },
    })
  }

  async appendValues(spreadsheetId: string, range: string, rows: CellValue[][]): Promise<void> {
    // RAW keeps "2024-03-01" a string instead of a date serial
    await this.sheets.spreadsheets.values.append({
      spreadsheetId,
      range,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: rows },
    })
  }

  async getValues(spreadsheetId: string, range: string): Promise<CellValue[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range,
      valueRenderOption: 'UNFORMATTED_VALUE',
    })
    const values: unknown[][] = res.data.values ?? []
    return values.map((row) => row.map(toCell))
  }

  async clearValues(spreadsheetId: string, range: string): Promise<void> {
    await this.sheets.spreadsheets.values.clear({ spreadsheetId, range })
  }
}

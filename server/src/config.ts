import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { LOG_SHEET_NAME, STAGING_TAB_NAME } from '../../shared/dailyLog'
import type { ServiceAccountCredentials } from './sheets/googleGateway'

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value })
    return true
  } catch {
    return false
  }
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined))

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4567),
  SPREADSHEET_NAME: z.string().trim().min(1).default(LOG_SHEET_NAME),
  STAGING_TAB: z.string().trim().min(1).default(STAGING_TAB_NAME),
  DRIVE_FOLDER_ID: optionalString,
  GOOGLE_SERVICE_ACCOUNT_JSON: optionalString,
  GOOGLE_SERVICE_ACCOUNT_FILE: optionalString,
  SHEETS_BACKEND: z.enum(['google', 'memory']).default('google'),
  STAGING_BACKEND: z.enum(['memory', 'sheet']).default('memory'),
  LOG_TIMEZONE: z
    .string()
    .default('America/New_York')
    .refine(isTimeZone, { message: 'Unknown time zone' }),
})

export interface AppConfig {
  port: number
  spreadsheetName: string
  stagingTab: string
  folderId?: string
  serviceAccountJson?: string
  serviceAccountFile?: string
  sheetsBackend: 'google' | 'memory'
  stagingBackend: 'memory' | 'sheet'
  timeZone: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid configuration: ${detail}`)
  }
  const e = parsed.data
  return {
    port: e.PORT,
    spreadsheetName: e.SPREADSHEET_NAME,
    stagingTab: e.STAGING_TAB,
    folderId: e.DRIVE_FOLDER_ID,
    serviceAccountJson: e.GOOGLE_SERVICE_ACCOUNT_JSON,
    serviceAccountFile: e.GOOGLE_SERVICE_ACCOUNT_FILE,
    sheetsBackend: e.SHEETS_BACKEND,
    stagingBackend: e.STAGING_BACKEND,
    timeZone: e.LOG_TIMEZONE,
  }
}

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
})

export function loadServiceAccount(
  config: Pick<AppConfig, 'serviceAccountJson' | 'serviceAccountFile'>
): ServiceAccountCredentials {
  const raw = config.serviceAccountJson
    ?? (config.serviceAccountFile ? readFileSync(config.serviceAccountFile, 'utf8') : undefined)
  if (!raw) {
    throw new Error('Set GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_SERVICE_ACCOUNT_FILE')
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    throw new Error('Service account credentials are not valid JSON')
  }
  const parsed = serviceAccountSchema.safeParse(json)
  if (!parsed.success) {
    throw new Error('Service account credentials need client_email and private_key')
  }
  return parsed.data
}

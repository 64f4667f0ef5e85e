import { describe, it, expect } from 'vitest'
import { loadConfig, loadServiceAccount } from '../config'

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 4567,
      spreadsheetName: 'Daily Activity Log',
      stagingTab: 'Temp_Activities',
      folderId: undefined,
      serviceAccountJson: undefined,
      serviceAccountFile: undefined,
      sheetsBackend: 'google',
      stagingBackend: 'memory',
      timeZone: 'America/New_York',
    })
  })

  it('reads overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      DRIVE_FOLDER_ID: 'folder-1',
      SHEETS_BACKEND: 'memory',
      STAGING_BACKEND: 'sheet',
      LOG_TIMEZONE: 'Europe/Berlin',
    })
    expect(config.port).toBe(8080)
    expect(config.folderId).toBe('folder-1')
    expect(config.sheetsBackend).toBe('memory')
    expect(config.stagingBackend).toBe('sheet')
    expect(config.timeZone).toBe('Europe/Berlin')
  })

  it('treats a blank folder id as unset', () => {
    expect(loadConfig({ DRIVE_FOLDER_ID: '  ' }).folderId).toBeUndefined()
  })

  it('rejects an unknown time zone', () => {
    expect(() => loadConfig({ LOG_TIMEZONE: 'Mars/Olympus' })).toThrow(
      'Invalid configuration: LOG_TIMEZONE: Unknown time zone'
    )
  })

  it('rejects an unknown staging backend', () => {
    expect(() => loadConfig({ STAGING_BACKEND: 'redis' })).toThrow(/^Invalid configuration: STAGING_BACKEND/)
  })
})

describe('loadServiceAccount', () => {
  it('parses inline JSON credentials', () => {
    const json = JSON.stringify({ client_email: 'logger@test.local', private_key: 'test-key', project_id: 'p' })
    expect(loadServiceAccount({ serviceAccountJson: json })).toEqual({
      client_email: 'logger@test.local',
      private_key: 'test-key',
    })
  })

  it('requires credentials', () => {
    expect(() => loadServiceAccount({})).toThrow('Set GOOGLE_SERVICE_ACCOUNT_JSON or GOOGLE_SERVICE_ACCOUNT_FILE')
  })

  it('rejects credentials without a key', () => {
    expect(() => loadServiceAccount({ serviceAccountJson: '{"client_email":"logger@test.local"}' })).toThrow(
      'Service account credentials need client_email and private_key'
    )
  })

  it('rejects malformed JSON', () => {
    expect(() => loadServiceAccount({ serviceAccountJson: '{' })).toThrow('Service account credentials are not valid JSON')
  })
})

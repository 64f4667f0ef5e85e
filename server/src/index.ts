import { createApp } from './app'
import { loadConfig, loadServiceAccount, type AppConfig } from './config'
import { DailyLogService } from './dailyLogService'
import type { SpreadsheetGateway } from './sheets/gateway'
import { GoogleSheetsGateway } from './sheets/googleGateway'
import { MemorySpreadsheetGateway } from './sheets/memoryGateway'
import { SpreadsheetClient } from './sheets/spreadsheetClient'
import { MemoryStagingStore, SheetStagingStore, type StagingStore } from './staging'

function buildGateway(config: AppConfig): { gateway: SpreadsheetGateway; serviceAccountEmail?: string } {
  if (config.sheetsBackend === 'memory') {
    console.log('[daily-log] using in-memory spreadsheet (nothing is persisted)')
    return { gateway: new MemorySpreadsheetGateway() }
  }
  const credentials = loadServiceAccount(config)
  return {
    gateway: GoogleSheetsGateway.fromServiceAccount(credentials),
    serviceAccountEmail: credentials.client_email,
  }
}

function start() {
  const config = loadConfig()
  const { gateway, serviceAccountEmail } = buildGateway(config)
  const client = new SpreadsheetClient(gateway, {
    serviceAccountEmail,
    folderId: config.folderId,
    stagingTab: config.stagingTab,
  })

  const staging: StagingStore =
    config.stagingBackend === 'sheet'
      ? new SheetStagingStore(client, () => client.ensureSpreadsheet(config.spreadsheetName))
      : new MemoryStagingStore()
  const service = new DailyLogService(client, staging, {
    spreadsheetName: config.spreadsheetName,
    timeZone: config.timeZone,
  })

  const app = createApp(service)
  app.listen(config.port, () => {
    console.log(
      `[daily-log] listening on http://127.0.0.1:${config.port} ` +
        `(sheet "${config.spreadsheetName}", staging: ${config.stagingBackend})`
    )
  })
}

try {
  start()
} catch (e) {
  console.error('[daily-log] failed to start:', e instanceof Error ? e.message : e)
  process.exit(1)
}

import express, { type NextFunction, type Request, type Response } from 'express'
import { ZodError } from 'zod'
import type { DailyLogForm, StagedActivity } from '../../shared/dailyLog'
import type { DailyLogService } from './dailyLogService'
import { ConnectionError, StagingError, errorMessage } from './errors'
import { dailyLogFormSchema, formatIssues, stagedActivitySchema } from './schemas'
import { sessionFromRequest } from './session'

type Handler = (req: Request, res: Response) => Promise<void>

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next)
  }
}

export function createApp(service: DailyLogService) {
  const app = express()
  app.use(express.json({ limit: '100kb' }))

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true })
  })

  app.get(
    '/api/entries',
    route(async (_req, res) => {
      const rows = await service.readEntries()
      res.json({ rows })
    })
  )

  app.post(
    '/api/entries',
    route(async (req, res) => {
      const form: DailyLogForm = dailyLogFormSchema.parse(req.body)
      const result = await service.submitEntry(sessionFromRequest(req), form)
      console.log(`[daily-log] saved entry for ${form.date} (${result.folded} activities)`)
      res.status(201).json({ ok: true, row: result.row, folded: result.folded })
    })
  )

  app.get(
    '/api/staging',
    route(async (req, res) => {
      const activities = await service.listActivities(sessionFromRequest(req))
      res.json({ activities })
    })
  )

  app.post(
    '/api/staging',
    route(async (req, res) => {
      const activity: StagedActivity = stagedActivitySchema.parse(req.body)
      const activities = await service.addActivity(sessionFromRequest(req), activity)
      res.status(201).json({ activities })
    })
  )

  app.delete(
    '/api/staging',
    route(async (req, res) => {
      await service.clearActivities(sessionFromRequest(req))
      res.json({ activities: [] })
    })
  )

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' })
  })

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(400).json({ error: formatIssues(err) })
      return
    }
    if (err instanceof StagingError) {
      res.status(400).json({ error: err.message })
      return
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON' })
      return
    }
    if (err instanceof ConnectionError) {
      console.error('[daily-log] spreadsheet error:', err.message)
      res.status(502).json({ error: `Google Sheets Connection Error: ${err.message}` })
      return
    }
    console.error('[daily-log] unexpected error:', err)
    res.status(500).json({ error: errorMessage(err, 'Internal error') })
  })

  return app
}

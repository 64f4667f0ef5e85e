import { z } from 'zod'
import {
  ACTIVITY_TYPES,
  type CellValue,
  type DailyLogForm,
  type StagedActivity,
} from '../../shared/dailyLog'

// ---- Helpers ----

function fetchWithTimeout(url: string, options: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)
  return fetch(url, { ...options, signal: controller.signal }).finally(() => clearTimeout(timeout))
}

function jsonHeaders(sessionId: string): HeadersInit {
  return { 'Content-Type': 'application/json', 'x-session-id': sessionId }
}

const errorBody = z.object({ error: z.string() })

async function readJson<T>(res: Response, schema: z.ZodType<T>, action: string): Promise<T> {
  const data: unknown = await res.json().catch(() => ({}))
  if (!res.ok) {
    const parsed = errorBody.safeParse(data)
    throw new Error(parsed.success ? parsed.data.error : `${action} failed (${res.status})`)
  }
  const parsed = schema.safeParse(data)
  if (!parsed.success) throw new Error(`${action}: unexpected response from server`)
  return parsed.data
}

const cell = z.union([z.string(), z.number()])

const rowsResponse = z.object({ rows: z.array(z.array(cell)) })

const stagedActivity = z.object({
  type: z.enum(ACTIVITY_TYPES),
  minutes: z.number(),
  notes: z.string(),
})

const activitiesResponse = z.object({ activities: z.array(stagedActivity) })

const submitResponse = z.object({
  ok: z.boolean(),
  row: z.array(cell),
  folded: z.number(),
})

// ---- Health check ----

export async function checkHealth(): Promise<boolean> {
  try {
    const res = await fetchWithTimeout('/api/health', { method: 'GET' }, 2500)
    if (!res.ok) return false
    const data: unknown = await res.json()
    return z.object({ ok: z.literal(true) }).safeParse(data).success
  } catch {
    return false
  }
}

// ---- Daily log ----

/** Header row plus every saved entry; [] when nothing was ever saved. */
export async function fetchEntries(): Promise<CellValue[][]> {
  const res = await fetchWithTimeout('/api/entries', { method: 'GET' }, 20_000)
  const data = await readJson(res, rowsResponse, 'Load entries')
  return data.rows
}

export async function submitEntry(
  sessionId: string,
  form: DailyLogForm
): Promise<{ row: CellValue[]; folded: number }> {
  const res = await fetchWithTimeout(
    '/api/entries',
    { method: 'POST', headers: jsonHeaders(sessionId), body: JSON.stringify(form) },
    20_000
  )
  const data = await readJson(res, submitResponse, 'Save entry')
  return { row: data.row, folded: data.folded }
}

// ---- Pending activities ----

export async function fetchStagedActivities(sessionId: string): Promise<StagedActivity[]> {
  const res = await fetchWithTimeout('/api/staging', { method: 'GET', headers: jsonHeaders(sessionId) }, 10_000)
  return (await readJson(res, activitiesResponse, 'Load activities')).activities
}

export async function addStagedActivity(
  sessionId: string,
  activity: StagedActivity
): Promise<StagedActivity[]> {
  const res = await fetchWithTimeout(
    '/api/staging',
    { method: 'POST', headers: jsonHeaders(sessionId), body: JSON.stringify(activity) },
    10_000
  )
  return (await readJson(res, activitiesResponse, 'Add activity')).activities
}

export async function clearStagedActivities(sessionId: string): Promise<void> {
  const res = await fetchWithTimeout('/api/staging', { method: 'DELETE', headers: jsonHeaders(sessionId) }, 10_000)
  await readJson(res, activitiesResponse, 'Clear activities')
}

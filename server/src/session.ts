import type { Request } from 'express'

export const SESSION_HEADER = 'x-session-id'
export const DEFAULT_SESSION_ID = 'default'

/** Per-browser-session state passed explicitly to every handler. */
export interface SessionContext {
  sessionId: string
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/

export function sessionFromRequest(req: Request): SessionContext {
  const raw = req.get(SESSION_HEADER)?.trim()
  return { sessionId: raw && SESSION_ID_PATTERN.test(raw) ? raw : DEFAULT_SESSION_ID }
}

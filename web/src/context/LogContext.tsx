import {
  createContext,
  useContext,
  useState,
  useCallback,
  useEffect,
  type ReactNode,
} from 'react'
import type { CellValue, DailyLogForm, StagedActivity } from '../../../shared/dailyLog'
import {
  fetchEntries,
  submitEntry as postEntry,
  fetchStagedActivities,
  addStagedActivity,
  clearStagedActivities,
} from '../api'

const SESSION_ID_KEY = 'daily-log-session-id'

function loadSessionId(): string {
  try {
    const existing = sessionStorage.getItem(SESSION_ID_KEY)
    if (existing) return existing
    const id = crypto.randomUUID()
    sessionStorage.setItem(SESSION_ID_KEY, id)
    return id
  } catch {
    return crypto.randomUUID()
  }
}

export function friendlyError(e: unknown, fallback: string): string {
  const raw = e instanceof Error ? e.message : fallback
  return /Load failed|Failed to fetch|NetworkError|aborted/i.test(raw)
    ? 'Cannot reach the log server right now. Start `npm run server` and reload this page.'
    : raw
}

// ---- Context shape ----

interface LogContextValue {
  sessionId: string

  // null until the first read finishes
  rows: CellValue[][] | null
  staged: StagedActivity[]

  loadingEntries: boolean
  entriesError: string
  stagingBusy: boolean
  stagingError: string
  submitting: boolean
  submitError: string
  savedDate: string

  refreshEntries: () => Promise<void>
  addActivity: (activity: StagedActivity) => Promise<boolean>
  clearActivities: () => Promise<void>
  submitEntry: (form: DailyLogForm) => Promise<boolean>
  dismissSaved: () => void
}

const LogContext = createContext<LogContextValue | null>(null)

export function LogProvider({ children }: { children: ReactNode }) {
  const [sessionId] = useState(loadSessionId)
  const [rows, setRows] = useState<CellValue[][] | null>(null)
  const [staged, setStaged] = useState<StagedActivity[]>([])

  const [loadingEntries, setLoadingEntries] = useState(false)
  const [entriesError, setEntriesError] = useState('')
  const [stagingBusy, setStagingBusy] = useState(false)
  const [stagingError, setStagingError] = useState('')
  const [submitting, setSubmitting] = useState(false)
  const [submitError, setSubmitError] = useState('')
  const [savedDate, setSavedDate] = useState('')

  const refreshEntries = useCallback(async () => {
    setLoadingEntries(true)
    setEntriesError('')
    try {
      setRows(await fetchEntries())
    } catch (e) {
      setEntriesError(friendlyError(e, 'Could not load entries'))
    } finally {
      setLoadingEntries(false)
    }
  }, [])

  const refreshStaged = useCallback(async () => {
    try {
      setStaged(await fetchStagedActivities(sessionId))
    } catch (e) {
      setStagingError(friendlyError(e, 'Could not load activities'))
    }
  }, [sessionId])

  useEffect(() => {
    void refreshEntries()
    void refreshStaged()
  }, [refreshEntries, refreshStaged])

  const addActivity = useCallback(
    async (activity: StagedActivity) => {
      setStagingBusy(true)
      setStagingError('')
      try {
        setStaged(await addStagedActivity(sessionId, activity))
        return true
      } catch (e) {
        setStagingError(friendlyError(e, 'Could not add activity'))
        return false
      } finally {
        setStagingBusy(false)
      }
    },
    [sessionId]
  )

  const clearActivities = useCallback(async () => {
    setStagingBusy(true)
    setStagingError('')
    try {
      await clearStagedActivities(sessionId)
      setStaged([])
    } catch (e) {
      setStagingError(friendlyError(e, 'Could not clear activities'))
    } finally {
      setStagingBusy(false)
    }
  }, [sessionId])

  const submitEntry = useCallback(
    async (form: DailyLogForm) => {
      setSubmitting(true)
      setSubmitError('')
      setSavedDate('')
      try {
        await postEntry(sessionId, form)
        setSavedDate(form.date)
        setStaged([])
        await refreshEntries()
        return true
      } catch (e) {
        setSubmitError(friendlyError(e, 'Save failed'))
        return false
      } finally {
        setSubmitting(false)
      }
    },
    [sessionId, refreshEntries]
  )

  const dismissSaved = useCallback(() => setSavedDate(''), [])

  const value: LogContextValue = {
    sessionId,
    rows,
    staged,
    loadingEntries,
    entriesError,
    stagingBusy,
    stagingError,
    submitting,
    submitError,
    savedDate,
    refreshEntries,
    addActivity,
    clearActivities,
    submitEntry,
    dismissSaved,
  }

  return <LogContext.Provider value={value}>{children}</LogContext.Provider>
}

export function useLog() {
  const ctx = useContext(LogContext)
  if (!ctx) throw new Error('useLog must be used within LogProvider')
  return ctx
}

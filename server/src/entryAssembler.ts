import {
  EMPTY_ACTIVITY_SLOT,
  MAX_ACTIVITY_SLOTS,
  type CellValue,
  type DailyLogForm,
  type StagedActivity,
} from '../../shared/dailyLog'

/** Exactly MAX_ACTIVITY_SLOTS activities, in staging order, padded with the sentinel. */
export function padActivitySlots(staged: readonly StagedActivity[]): StagedActivity[] {
  const kept = staged.slice(0, MAX_ACTIVITY_SLOTS)
  const padding = Array.from({ length: MAX_ACTIVITY_SLOTS - kept.length }, () => ({ ...EMPTY_ACTIVITY_SLOT }))
  return [...kept, ...padding]
}

export function assembleRow(
  form: DailyLogForm,
  staged: readonly StagedActivity[],
  timestamp: string
): CellValue[] {
  const { exercise1: ex1, exercise2: ex2 } = form
  return [
    form.date,
    form.satisfaction,
    form.neuralgia,
    ex1.type,
    ex1.minutes,
    ex1.miles,
    ex2.type,
    ex2.minutes,
    ex2.miles,
    ...padActivitySlots(staged).flatMap((a) => [a.type, a.minutes, a.notes]),
    form.insights,
    timestamp,
  ]
}

/** `YYYY-MM-DD HH:mm:ss` as read on a wall clock in `timeZone`. */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date)
  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '00'
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`
}

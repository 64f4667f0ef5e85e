import {
  LEGACY_HEADER_ALIASES,
  MAX_ACTIVITY_SLOTS,
  SENTINEL_TYPE,
  activitySlotHeaders,
  type CellValue,
} from '../../../shared/dailyLog'

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const

export interface ExerciseCell {
  type: string
  minutes: number
  miles: number
}

export interface ActivityCell {
  type: string
  minutes: number
  notes: string
}

export interface LogRecord {
  date: string
  satisfaction: number
  neuralgia: number
  exercises: ExerciseCell[]
  activities: ActivityCell[]
  insights: string
  timestamp: string
  row: CellValue[]
}

export interface ExercisePoint {
  date: string
  category: string
  minutes: number
  miles: number
}

export interface ActivityPoint {
  date: string
  category: string
  minutes: number
  notes: string
}

export interface CategoryTotal {
  label: string
  value: number
}

export interface DatedValue {
  date: string
  value: number
}

// ---- Cell coercion ----

// Non-numeric cells count as 0
export function toNumber(value: CellValue | undefined): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0
  if (value === undefined || value.trim() === '') return 0
  const n = Number(value)
  return Number.isFinite(n) ? n : 0
}

export function toText(value: CellValue | undefined): string {
  return value === undefined ? '' : String(value)
}

const SHEETS_EPOCH_MS = Date.UTC(1899, 11, 30)

// A date typed into the sheet by hand comes back as a day serial
function toDateText(value: CellValue | undefined): string {
  if (typeof value === 'number' && value > 0) {
    return new Date(SHEETS_EPOCH_MS + Math.floor(value) * 86_400_000).toISOString().slice(0, 10)
  }
  return toText(value).trim()
}

function isSentinel(category: string): boolean {
  return category === '' || category === SENTINEL_TYPE
}

// ---- Rows -> records ----

export function parseLogRows(rows: CellValue[][]): LogRecord[] {
  if (rows.length === 0) return []
  const [header, ...body] = rows

  const index = new Map<string, number>()
  header.forEach((h, i) => {
    const name = toText(h).trim()
    const key = LEGACY_HEADER_ALIASES.get(name) ?? name
    if (!index.has(key)) index.set(key, i)
  })

  return body
    .filter((row) => row.some((c) => toText(c).trim() !== ''))
    .map((row) => {
      const cell = (name: string): CellValue | undefined => {
        const i = index.get(name)
        return i === undefined ? undefined : row[i]
      }
      const exercises = [1, 2].map((n) => ({
        type: toText(cell(`Ex${n}_Type`)).trim(),
        minutes: toNumber(cell(`Ex${n}_Mins`)),
        miles: toNumber(cell(`Ex${n}_Miles`)),
      }))
      const activities = Array.from({ length: MAX_ACTIVITY_SLOTS }, (_, i) => {
        const [typeCol, minsCol, notesCol] = activitySlotHeaders(i + 1)
        return {
          type: toText(cell(typeCol)).trim(),
          minutes: toNumber(cell(minsCol)),
          notes: toText(cell(notesCol)),
        }
      })
      return {
        date: toDateText(cell('Date')),
        satisfaction: toNumber(cell('Satisfaction')),
        neuralgia: toNumber(cell('Neuralgia')),
        exercises,
        activities,
        insights: toText(cell('Insights')),
        timestamp: toText(cell('Timestamp')),
        row: header.map((_, i) => row[i] ?? ''),
      }
    })
}

// ---- Month filter ----

export function monthName(date: string): string | null {
  const iso = date.match(/^(\d{4})-(\d{1,2})-(\d{1,2})/)
  if (iso) {
    const month = parseInt(iso[2], 10)
    return month >= 1 && month <= 12 ? MONTH_NAMES[month - 1] : null
  }
  const parsed = new Date(date)
  return Number.isNaN(parsed.getTime()) ? null : MONTH_NAMES[parsed.getMonth()]
}

/** Months present in the data, January first. Years are not told apart. */
export function availableMonths(records: LogRecord[]): string[] {
  const present = new Set(records.map((r) => monthName(r.date)))
  return MONTH_NAMES.filter((m) => present.has(m))
}

export function filterByMonth(records: LogRecord[], month: string): LogRecord[] {
  return records.filter((r) => monthName(r.date) === month)
}

export function defaultMonth(months: string[], today: Date = new Date()): string {
  const current = MONTH_NAMES[today.getMonth()]
  return months.includes(current) ? current : months[months.length - 1] ?? current
}

// ---- Wide -> long ----

export function unpivotExercises(records: LogRecord[]): ExercisePoint[] {
  return records.flatMap((r) =>
    r.exercises
      .filter((e) => !isSentinel(e.type))
      .map((e) => ({ date: r.date, category: e.type, minutes: e.minutes, miles: e.miles }))
  )
}

export function unpivotActivities(records: LogRecord[]): ActivityPoint[] {
  return records.flatMap((r) =>
    r.activities
      .filter((a) => !isSentinel(a.type))
      .map((a) => ({ date: r.date, category: a.type, minutes: a.minutes, notes: a.notes }))
  )
}

// ---- Chart series ----

export function totalsByCategory(points: { category: string; minutes: number }[]): CategoryTotal[] {
  const totals = new Map<string, number>()
  for (const p of points) totals.set(p.category, (totals.get(p.category) ?? 0) + p.minutes)
  return [...totals]
    .map(([label, value]) => ({ label, value }))
    .sort((a, b) => b.value - a.value || a.label.localeCompare(b.label))
}

export function dailyTotals(points: { date: string; minutes: number }[]): DatedValue[] {
  const totals = new Map<string, number>()
  for (const p of points) totals.set(p.date, (totals.get(p.date) ?? 0) + p.minutes)
  return [...totals]
    .map(([date, value]) => ({ date, value }))
    .sort((a, b) => a.date.localeCompare(b.date))
}

export interface RatingPoint {
  date: string
  satisfaction: number
  neuralgia: number
}

export function ratingSeries(records: LogRecord[]): RatingPoint[] {
  return records
    .map((r) => ({ date: r.date, satisfaction: r.satisfaction, neuralgia: r.neuralgia }))
    .sort((a, b) => a.date.localeCompare(b.date))
}

// ---- Raw table ----

function isEmptyCell(value: CellValue): boolean {
  return value === '' || value === 0 || value === SENTINEL_TYPE
}

/** Column indexes that hold something other than blanks and sentinels in these rows. */
export function visibleColumns(header: CellValue[], records: LogRecord[]): number[] {
  return header
    .map((_, i) => i)
    .filter((i) => i === 0 || records.some((r) => !isEmptyCell(r.row[i] ?? '')))
}

// ---- Row schema shared by the form, the API and the report ----

export const EXERCISE_TYPES = ['None', 'Swim', 'Run', 'Cycle', 'Yoga', 'Other'] as const

export const ACTIVITY_TYPES = [
  'None',
  'Walk',
  'Stretching',
  'Meditation',
  'Reading',
  'Housework',
  'Gardening',
  'Socializing',
  'Other',
] as const

export type ExerciseType = (typeof EXERCISE_TYPES)[number]
export type ActivityType = (typeof ACTIVITY_TYPES)[number]

export const SENTINEL_TYPE = 'None'
export const MAX_ACTIVITY_SLOTS = 10
export const RATING_MIN = 1
export const RATING_MAX = 5

export const LOG_SHEET_NAME = 'Daily Activity Log'
export const STAGING_TAB_NAME = 'Temp_Activities'
export const STAGING_CLEAR_RANGE = 'A2:C100'

export type CellValue = string | number

export interface ExerciseEntry {
  type: ExerciseType
  minutes: number
  miles: number
}

export interface StagedActivity {
  type: ActivityType
  minutes: number
  notes: string
}

export interface DailyLogForm {
  date: string // YYYY-MM-DD
  satisfaction: number
  neuralgia: number
  exercise1: ExerciseEntry
  exercise2: ExerciseEntry
  insights: string
}

export const EMPTY_ACTIVITY_SLOT: StagedActivity = { type: SENTINEL_TYPE, minutes: 0, notes: '' }

export const EMPTY_EXERCISE: ExerciseEntry = { type: SENTINEL_TYPE, minutes: 0, miles: 0 }

export function activitySlotHeaders(slot: number): [string, string, string] {
  return [`Act${slot}_Type`, `Act${slot}_Mins`, `Act${slot}_Notes`]
}

export const LOG_HEADERS: readonly string[] = [
  'Date',
  'Satisfaction',
  'Neuralgia',
  'Ex1_Type',
  'Ex1_Mins',
  'Ex1_Miles',
  'Ex2_Type',
  'Ex2_Mins',
  'Ex2_Miles',
  ...Array.from({ length: MAX_ACTIVITY_SLOTS }, (_, i) => activitySlotHeaders(i + 1)).flat(),
  'Insights',
  'Timestamp',
]

export const STAGING_HEADERS: readonly string[] = ['Activity', 'Mins', 'Notes']

// Headers written by the first revision of the sheet
export const LEGACY_HEADER_ALIASES: ReadonlyMap<string, string> = new Map([
  ['Exercise_Type', 'Ex1_Type'],
  ['Exercise_Mins', 'Ex1_Mins'],
])

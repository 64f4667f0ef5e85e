import { z } from 'zod'
import {
  ACTIVITY_TYPES,
  EXERCISE_TYPES,
  RATING_MAX,
  RATING_MIN,
} from '../../shared/dailyLog'

const rating = z.coerce.number().int().min(RATING_MIN).max(RATING_MAX)

const exerciseSchema = z.object({
  type: z.enum(EXERCISE_TYPES).default('None'),
  minutes: z.coerce.number().min(0).default(0),
  miles: z.coerce.number().min(0).default(0),
})

export const dailyLogFormSchema = z.object({
  date: z.string().date(),
  satisfaction: rating,
  neuralgia: rating,
  exercise1: exerciseSchema.default({}),
  exercise2: exerciseSchema.default({}),
  insights: z.string().default(''),
})

export const stagedActivitySchema = z.object({
  type: z.enum(ACTIVITY_TYPES),
  minutes: z.coerce.number().int().min(0),
  notes: z.string().trim().default(''),
})

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ')
}

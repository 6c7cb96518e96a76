/**
 * Command-line input for the five working days
 */

import { z } from 'zod'
import { WORK_WEEK } from '@shared/constants'
import { Weekday } from '@shared/enums'
import type { DayInput } from '@shared/timesheet-types'

export interface RawDayFields {
  start: string
  end: string
  lunch: string
}

export type DayOptionKey = 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday'

export const DAY_OPTION_KEYS: Record<Weekday, DayOptionKey> = {
  [Weekday.Monday]: 'monday',
  [Weekday.Tuesday]: 'tuesday',
  [Weekday.Wednesday]: 'wednesday',
  [Weekday.Thursday]: 'thursday',
  [Weekday.Friday]: 'friday',
}

export class DayArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DayArgumentError'
  }
}

const BLANK_DAY: RawDayFields = { start: '', end: '', lunch: '' }

/**
 * Split "start,end,lunch" into fields; trailing fields may be omitted
 */
export function parseDayArgument(value: string): RawDayFields {
  const parts = value.split(',')
  if (parts.length > 3) {
    throw new DayArgumentError(`Expected "start,end,lunch", got "${value}"`)
  }
  const [start = '', end = '', lunch = ''] = parts.map(part => part.trim())
  return { start, end, lunch }
}

const fieldValue = z.union([z.string(), z.number()]).transform(value => String(value))

const DayFileEntrySchema = z.object({
  start: fieldValue.optional(),
  end: fieldValue.optional(),
  lunch: fieldValue.optional(),
}).strict()

export const WeekFileSchema = z.object({
  monday: DayFileEntrySchema.optional(),
  tuesday: DayFileEntrySchema.optional(),
  wednesday: DayFileEntrySchema.optional(),
  thursday: DayFileEntrySchema.optional(),
  friday: DayFileEntrySchema.optional(),
}).strict()

export type WeekFile = z.infer<typeof WeekFileSchema>

/**
 * Validate the parsed JSON of a week file
 */
export function parseWeekFile(json: unknown): WeekFile {
  const parsed = WeekFileSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'file'}: ${issue.message}`)
    throw new DayArgumentError(`Invalid week file: ${issues.join('; ')}`)
  }
  return parsed.data
}

/**
 * Build the five DayInputs. Per-day arguments replace the file's entry
 * for that day.
 */
export function buildWeekInput(
  file: WeekFile | undefined,
  dayArguments: Partial<Record<DayOptionKey, RawDayFields>>,
): DayInput[] {
  return WORK_WEEK.map(day => {
    const key = DAY_OPTION_KEYS[day]
    const fromFile = file?.[key]
    const fields = dayArguments[key] ?? {
      start: fromFile?.start ?? BLANK_DAY.start,
      end: fromFile?.end ?? BLANK_DAY.end,
      lunch: fromFile?.lunch ?? BLANK_DAY.lunch,
    }
    return { day, ...fields }
  })
}

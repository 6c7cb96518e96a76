/**
 * Shared constants for the timesheet engine
 *
 * Note: Enums live in shared/enums.ts. Tunable defaults are read through
 * shared/timesheet-settings.ts; the values here seed those settings.
 */

import { Weekday } from './enums'

export const WORK_WEEK: readonly Weekday[] = [
  Weekday.Monday,
  Weekday.Tuesday,
  Weekday.Wednesday,
  Weekday.Thursday,
  Weekday.Friday,
] as const

export const TIMESHEET_DEFAULTS = {
  WEEKLY_TARGET_HOURS: 40,
  ASSUMED_DAY_HOURS: 8,
  DEFAULT_LUNCH_MINUTES: 60,
  FRIDAY_DEFAULT_START: '8:00 AM',
  ROUNDING_INCREMENT_MINUTES: 15,
} as const

export const MINUTES_PER_HOUR = 60
export const MINUTES_PER_DAY = 24 * MINUTES_PER_HOUR

export const DATE_FORMATS = {
  DISPLAY_TIME: 'h:mm A',
} as const

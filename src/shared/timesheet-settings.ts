/**
 * Engine settings
 *
 * Defaults reproduce the standard 40-hour week. Every override, from code or
 * from the environment, goes through the same zod schema.
 */

import { z } from 'zod'
import { TIMESHEET_DEFAULTS } from './constants'
import { TimeRole } from './enums'
import { logger } from './logger'
import { parseTime } from './time-parser'
import { SettingsError } from './timesheet-types'

export const TimesheetSettingsSchema = z.object({
  weeklyTargetHours: z.number().positive().max(168),
  assumedDayHours: z.number().min(0).max(24),
  defaultLunchMinutes: z.number().int().min(0).max(24 * 60),
  fridayDefaultStart: z.string().refine(
    value => parseTime(value, TimeRole.Start).ok,
    { message: 'must be a clock time such as "8:00 AM"' },
  ),
  roundingIncrementMinutes: z.number().int().positive().max(60),
})

export type TimesheetSettings = z.infer<typeof TimesheetSettingsSchema>

export const DEFAULT_TIMESHEET_SETTINGS: Readonly<TimesheetSettings> = Object.freeze({
  weeklyTargetHours: TIMESHEET_DEFAULTS.WEEKLY_TARGET_HOURS,
  assumedDayHours: TIMESHEET_DEFAULTS.ASSUMED_DAY_HOURS,
  defaultLunchMinutes: TIMESHEET_DEFAULTS.DEFAULT_LUNCH_MINUTES,
  fridayDefaultStart: TIMESHEET_DEFAULTS.FRIDAY_DEFAULT_START,
  roundingIncrementMinutes: TIMESHEET_DEFAULTS.ROUNDING_INCREMENT_MINUTES,
})

/**
 * Environment variable for each setting
 */
export const SETTINGS_ENV_KEYS = {
  weeklyTargetHours: 'TIMESHEET_WEEKLY_TARGET_HOURS',
  assumedDayHours: 'TIMESHEET_ASSUMED_DAY_HOURS',
  defaultLunchMinutes: 'TIMESHEET_DEFAULT_LUNCH_MINUTES',
  fridayDefaultStart: 'TIMESHEET_FRIDAY_DEFAULT_START',
  roundingIncrementMinutes: 'TIMESHEET_ROUNDING_INCREMENT_MINUTES',
} as const satisfies Record<keyof TimesheetSettings, string>

const EnvSettingsSchema = z.object({
  weeklyTargetHours: z.coerce.number().optional(),
  assumedDayHours: z.coerce.number().optional(),
  defaultLunchMinutes: z.coerce.number().optional(),
  fridayDefaultStart: z.string().optional(),
  roundingIncrementMinutes: z.coerce.number().optional(),
})

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveSettings(overrides: Partial<TimesheetSettings> = {}): TimesheetSettings {
  const parsed = TimesheetSettingsSchema.safeParse({ ...DEFAULT_TIMESHEET_SETTINGS, ...overrides })
  if (!parsed.success) {
    throw new SettingsError(formatIssues(parsed.error))
  }
  return Object.freeze(parsed.data)
}

/**
 * Read settings from TIMESHEET_* environment variables. Unset or empty
 * variables keep their default.
 */
export function loadTimesheetSettings(env: NodeJS.ProcessEnv = process.env): TimesheetSettings {
  const raw: Record<string, string> = {}
  for (const [key, envKey] of Object.entries(SETTINGS_ENV_KEYS)) {
    const value = env[envKey]?.trim()
    if (value) {
      raw[key] = value
    }
  }

  const parsed = EnvSettingsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new SettingsError(formatIssues(parsed.error))
  }

  if (Object.keys(raw).length > 0) {
    logger.config.debug('Settings overridden from environment', { keys: Object.keys(raw) })
  }

  // Keys absent from `raw` stay absent from the parsed output
  return resolveSettings(parsed.data)
}

/**
 * Lunch duration validation
 *
 * A blank lunch falls back to the default duration on every day and always
 * carries a warning. Invalid values are reported, never replaced.
 */

import { MINUTES_PER_DAY } from './constants'
import { DayField, MessageKind, Severity, Weekday } from './enums'
import { createMessage } from './result-aggregator'
import { isBlank } from './time-parser'
import { DEFAULT_TIMESHEET_SETTINGS } from './timesheet-settings'
import type { TimesheetSettings } from './timesheet-settings'
import { err, ok } from './timesheet-types'
import type { LunchOutcome, LunchValidationError, Result } from './timesheet-types'

const WHOLE_MINUTES = /^\d+$/

export function validateLunch(
  raw: string,
  day: Weekday,
  settings: Pick<TimesheetSettings, 'defaultLunchMinutes'> = DEFAULT_TIMESHEET_SETTINGS,
): Result<LunchOutcome, LunchValidationError> {
  const field = { day, field: DayField.Lunch }

  if (isBlank(raw)) {
    const minutes = settings.defaultLunchMinutes
    return ok({
      minutes,
      warning: createMessage(
        Severity.Warning,
        MessageKind.Assumption,
        `${day}: lunch assumed ${minutes} minutes`,
        field,
      ),
    })
  }

  const text = raw.trim()
  const invalid = (reason: string) => err({
    raw,
    message: createMessage(Severity.Error, MessageKind.Validation, `${day} lunch: ${reason}`, field),
  })

  if (!WHOLE_MINUTES.test(text)) {
    return invalid(`invalid lunch duration "${text}"`)
  }

  const minutes = Number(text)
  if (minutes > MINUTES_PER_DAY) {
    return invalid(`lunch duration over ${MINUTES_PER_DAY} minutes`)
  }

  return ok({ minutes })
}

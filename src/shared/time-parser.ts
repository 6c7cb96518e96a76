/**
 * Free-form clock time parsing
 *
 * Accepted forms (case-insensitive, surrounding whitespace ignored):
 *   "8", "08", "8a", "8 PM", "8:30", "8:30pm", "8:30 a.m.", "16:00", "0:15"
 *   "0830", "830", "1730" (minutes without a colon), "8:" (trailing colon)
 *
 * Without a meridiem, hours 1-12 take the default for their role: a start
 * time is AM and an end time is PM. Hours 0 and 13-23 are 24-hour clock
 * values and are used as entered.
 */

import { TimeParseFailure, TimeRole } from './enums'
import { createTimeOfDay, toParsedTime } from './time-of-day'
import { err, ok } from './timesheet-types'
import type { ParsedTime, Result, TimeParseError } from './timesheet-types'

const TIME_PATTERN = /^(\d{1,2})(?::(\d{2})?|(\d{2}))?\s*(am|pm|a\.m\.|p\.m\.|a|p)?$/i

type Meridiem = 'am' | 'pm'

function readMeridiem(token: string | undefined): Meridiem | undefined {
  if (!token) return undefined
  return token.toLowerCase().startsWith('a') ? 'am' : 'pm'
}

/**
 * Convert a 12-hour clock hour (1-12) to 0-23
 */
function to24Hour(hour: number, meridiem: Meridiem): number {
  const base = hour % 12
  return meridiem === 'pm' ? base + 12 : base
}

function defaultMeridiem(role: TimeRole): Meridiem {
  return role === TimeRole.Start ? 'am' : 'pm'
}

export function parseTime(raw: string, role: TimeRole): Result<ParsedTime, TimeParseError> {
  const text = raw.trim()
  if (text === '') {
    return err({ reason: TimeParseFailure.Blank, raw })
  }

  const match = TIME_PATTERN.exec(text)
  if (!match) {
    return err({ reason: TimeParseFailure.Malformed, raw })
  }

  const [, hourText, colonMinutes, bareMinutes, meridiemToken] = match
  const minuteText = colonMinutes ?? bareMinutes
  const hour = Number(hourText)
  const minute = minuteText === undefined ? 0 : Number(minuteText)
  const meridiem = readMeridiem(meridiemToken)

  if (hour > 23) {
    return err({ reason: TimeParseFailure.HourOutOfRange, raw })
  }
  if (minute > 59) {
    return err({ reason: TimeParseFailure.MinuteOutOfRange, raw })
  }

  let resolvedHour: number
  if (meridiem) {
    // "0 PM" and "13 PM" mix the two clocks
    if (hour < 1 || hour > 12) {
      return err({ reason: TimeParseFailure.HourOutOfRange, raw })
    }
    resolvedHour = to24Hour(hour, meridiem)
  } else if (hour === 0 || hour >= 13) {
    resolvedHour = hour
  } else {
    resolvedHour = to24Hour(hour, defaultMeridiem(role))
  }

  return ok(toParsedTime(createTimeOfDay(resolvedHour, minute)))
}

/**
 * True when the raw field holds nothing but whitespace
 */
export function isBlank(raw: string): boolean {
  return raw.trim() === ''
}

export function describeParseFailure(error: TimeParseError): string {
  switch (error.reason) {
    case TimeParseFailure.Blank:
      return 'no time entered'
    case TimeParseFailure.Malformed:
      return 'not a recognized time'
    case TimeParseFailure.HourOutOfRange:
      return 'hour out of range'
    case TimeParseFailure.MinuteOutOfRange:
      return 'minute out of range'
  }
}

/**
 * TimeOfDay helpers
 * A TimeOfDay has no date component; arithmetic wraps around midnight.
 */

import dayjs from 'dayjs'
import { DATE_FORMATS, MINUTES_PER_DAY, MINUTES_PER_HOUR } from './constants'
import type { ParsedTime, TimeOfDay } from './timesheet-types'

// Any date without a DST transition works; only the clock fields are formatted
const FORMAT_ANCHOR = { year: 2000, month: 0, date: 3 } as const

export function createTimeOfDay(hour: number, minute: number): TimeOfDay {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new RangeError(`Hour must be an integer from 0 to 23, got ${hour}`)
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    throw new RangeError(`Minute must be an integer from 0 to 59, got ${minute}`)
  }
  return Object.freeze({ hour, minute })
}

/**
 * Minutes since midnight
 */
export function toMinutes(time: TimeOfDay): number {
  return time.hour * MINUTES_PER_HOUR + time.minute
}

/**
 * Build a TimeOfDay from minutes since midnight, wrapping past 24h
 */
export function fromMinutes(totalMinutes: number): TimeOfDay {
  const wrapped = ((Math.round(totalMinutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY
  return createTimeOfDay(Math.floor(wrapped / MINUTES_PER_HOUR), wrapped % MINUTES_PER_HOUR)
}

export function compareTimes(a: TimeOfDay, b: TimeOfDay): number {
  return toMinutes(a) - toMinutes(b)
}

export function isSameTime(a: TimeOfDay, b: TimeOfDay): boolean {
  return compareTimes(a, b) === 0
}

/**
 * Format as "h:mm A", e.g. "4:00 PM"
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  return dayjs(new Date(FORMAT_ANCHOR.year, FORMAT_ANCHOR.month, FORMAT_ANCHOR.date, time.hour, time.minute))
    .format(DATE_FORMATS.DISPLAY_TIME)
}

export function toParsedTime(time: TimeOfDay): ParsedTime {
  return Object.freeze({ time, display: formatTimeOfDay(time) })
}

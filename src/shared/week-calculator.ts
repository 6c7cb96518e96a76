/**
 * Weekly totals and the Friday clock-out projection
 *
 * Monday to Thursday are processed as ordinary days. Friday is open-ended:
 * a blank start falls back to the configured default, a blank end is the
 * normal case, and its lunch is always resolved because the projection
 * needs it.
 *
 * The projection is advisory. When Friday's end is entered, Friday's hours
 * come from the entered times and the projection is still reported next
 * to them.
 */

import { MINUTES_PER_DAY, MINUTES_PER_HOUR, WORK_WEEK } from './constants'
import { evaluateDay, processDay } from './day-processor'
import type { DayEvaluation } from './day-processor'
import { MessageKind, Severity, TimeRole } from './enums'
import { logger } from './logger'
import { aggregateMessages, createMessage } from './result-aggregator'
import { fromMinutes, toMinutes, toParsedTime } from './time-of-day'
import { parseTime } from './time-parser'
import { formatHoursDisplay } from './time-utils'
import { DEFAULT_TIMESHEET_SETTINGS } from './timesheet-settings'
import type { TimesheetSettings } from './timesheet-settings'
import { SettingsError, WeekInputError } from './timesheet-types'
import type { DayInput, DayResult, Message, ParsedTime, WeekResult } from './timesheet-types'

export type WorkWeekInput = readonly [DayInput, DayInput, DayInput, DayInput, DayInput]

/**
 * Ensure exactly five days, Monday to Friday, in order
 */
export function assertWorkWeek(days: readonly DayInput[]): asserts days is WorkWeekInput {
  if (days.length !== WORK_WEEK.length) {
    throw new WeekInputError(`Expected ${WORK_WEEK.length} days (Monday to Friday), got ${days.length}`)
  }
  days.forEach((input, index) => {
    const expected = WORK_WEEK[index]
    if (input.day !== expected) {
      throw new WeekInputError(`Expected ${expected} at position ${index + 1}, got ${input.day}`)
    }
  })
}

function resolveFridayDefaultStart(settings: TimesheetSettings): ParsedTime {
  const parsed = parseTime(settings.fridayDefaultStart, TimeRole.Start)
  if (!parsed.ok) {
    throw new SettingsError([`fridayDefaultStart: "${settings.fridayDefaultStart}" is not a clock time`])
  }
  return parsed.value
}

function sumHours(days: readonly DayResult[]): number {
  return days.reduce((total, day) => total + day.hoursWorked, 0)
}

/**
 * Project the Friday clock-out that brings the week to the target.
 * Week-level messages explaining the outcome are appended to `messages`.
 */
export function projectFridayClockOut(
  friday: DayEvaluation,
  preFridayTotal: number,
  settings: TimesheetSettings,
  messages: Message[],
): ParsedTime | undefined {
  const { start, lunch } = friday

  if (start.status === 'invalid' || start.status === 'blank') {
    messages.push(createMessage(
      Severity.Error,
      MessageKind.Projection,
      'Friday clock-out unavailable: Friday start is invalid',
    ))
    return undefined
  }

  if (preFridayTotal >= settings.weeklyTargetHours) {
    messages.push(createMessage(
      Severity.Info,
      MessageKind.Milestone,
      `${formatHoursDisplay(settings.weeklyTargetHours)} hours reached before Friday`,
    ))
    return start.time
  }

  if (lunch.status !== 'valid') {
    messages.push(createMessage(
      Severity.Error,
      MessageKind.Projection,
      'Friday clock-out unavailable: Friday lunch is invalid',
    ))
    return undefined
  }

  const remainingMinutes = Math.round((settings.weeklyTargetHours - preFridayTotal) * MINUTES_PER_HOUR)
  const clockOutMinutes = toMinutes(start.time.time) + remainingMinutes + lunch.minutes

  if (clockOutMinutes >= MINUTES_PER_DAY) {
    messages.push(createMessage(
      Severity.Warning,
      MessageKind.Projection,
      'Friday clock-out falls after midnight',
    ))
  }

  return toParsedTime(fromMinutes(clockOutMinutes))
}

export function calculateWeek(
  days: readonly DayInput[],
  settings: TimesheetSettings = DEFAULT_TIMESHEET_SETTINGS,
): WeekResult {
  assertWorkWeek(days)
  const [monday, tuesday, wednesday, thursday, friday] = days

  const preFridayDays = [monday, tuesday, wednesday, thursday].map(input => processDay(input, { settings }))
  const fridayEvaluation = evaluateDay(friday, {
    settings,
    defaultStart: resolveFridayDefaultStart(settings),
    openEnded: true,
  })

  const preFridayTotal = sumHours(preFridayDays)
  const overallMessages: Message[] = []
  const fridayClockOut = projectFridayClockOut(fridayEvaluation, preFridayTotal, settings, overallMessages)

  const dayResults = [...preFridayDays, fridayEvaluation.result]
  const totalHoursWorked = preFridayTotal + fridayEvaluation.result.hoursWorked
  const hoursTo40 = settings.weeklyTargetHours - totalHoursWorked
  const messages = aggregateMessages(dayResults, overallMessages)

  logger.engine.debug('Week calculated', () => ({
    preFridayTotal,
    totalHoursWorked,
    hoursTo40,
    fridayClockOut: fridayClockOut?.display ?? null,
    messageCount: messages.length,
  }))

  return Object.freeze({
    days: Object.freeze(dayResults),
    preFridayTotal,
    totalHoursWorked,
    hoursTo40,
    fridayClockOut,
    overallMessages: Object.freeze(overallMessages),
    messages: Object.freeze(messages),
  })
}

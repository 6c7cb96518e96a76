/**
 * Single-day processing
 *
 * Turns one row of raw start/end/lunch text into a DayResult. Each field is
 * checked independently so one mistake never hides another.
 *
 * Outcomes:
 * - complete: start and end parse, end after start -> hours from the shift minus lunch
 * - assumed: start and end both blank -> the assumed full day, lunch unused
 * - open: only end blank on an open-ended day (Friday) -> 0 hours, lunch kept for projection
 * - erroneous: anything else -> 0 hours plus the Error messages explaining why
 */

import { DayField, MessageKind, Severity, TimeRole } from './enums'
import { validateLunch } from './lunch-validator'
import { createMessage } from './result-aggregator'
import { toMinutes } from './time-of-day'
import { describeParseFailure, isBlank, parseTime } from './time-parser'
import { minutesToQuarterHours } from './time-utils'
import { DEFAULT_TIMESHEET_SETTINGS } from './timesheet-settings'
import type { TimesheetSettings } from './timesheet-settings'
import type { DayInput, DayResult, Message, ParsedTime } from './timesheet-types'

export interface ProcessDayOptions {
  settings?: TimesheetSettings
  // Used, with a warning, when the start field is blank
  defaultStart?: ParsedTime
  // A blank end is expected rather than an error, and lunch is always resolved
  openEnded?: boolean
}

export type StartState =
  | { status: 'entered'; time: ParsedTime }
  | { status: 'defaulted'; time: ParsedTime }
  | { status: 'blank' }
  | { status: 'invalid' }

export type LunchState =
  | { status: 'valid'; minutes: number }
  | { status: 'invalid' }
  | { status: 'unused' }

export interface DayEvaluation {
  result: DayResult
  start: StartState
  lunch: LunchState
}

type FieldParse =
  | { status: 'parsed'; time: ParsedTime }
  | { status: 'blank' }
  | { status: 'invalid' }

export function evaluateDay(input: DayInput, options: ProcessDayOptions = {}): DayEvaluation {
  const settings = options.settings ?? DEFAULT_TIMESHEET_SETTINGS
  const { day } = input
  const messages: Message[] = []

  const readField = (raw: string, role: TimeRole, field: DayField): FieldParse => {
    if (isBlank(raw)) return { status: 'blank' }
    const parsed = parseTime(raw, role)
    if (parsed.ok) return { status: 'parsed', time: parsed.value }
    messages.push(createMessage(
      Severity.Error,
      MessageKind.Parse,
      `${day} ${field}: invalid time "${raw.trim()}" (${describeParseFailure(parsed.error)})`,
      { day, field },
    ))
    return { status: 'invalid' }
  }

  // Records the lunch error, if any, without using the value
  const checkUnusedLunch = (): LunchState => {
    if (isBlank(input.lunch)) return { status: 'unused' }
    const lunch = validateLunch(input.lunch, day, settings)
    if (lunch.ok) return { status: 'unused' }
    messages.push(lunch.error.message)
    return { status: 'invalid' }
  }

  const resolveLunch = (): LunchState => {
    const lunch = validateLunch(input.lunch, day, settings)
    if (!lunch.ok) {
      messages.push(lunch.error.message)
      return { status: 'invalid' }
    }
    if (lunch.value.warning) {
      messages.push(lunch.value.warning)
    }
    return { status: 'valid', minutes: lunch.value.minutes }
  }

  const settleLunch = (): LunchState => (options.openEnded ? resolveLunch() : checkUnusedLunch())

  let start: StartState
  const startField = readField(input.start, TimeRole.Start, DayField.Start)
  if (startField.status === 'parsed') {
    start = { status: 'entered', time: startField.time }
  } else if (startField.status === 'blank' && options.defaultStart) {
    start = { status: 'defaulted', time: options.defaultStart }
    messages.push(createMessage(
      Severity.Warning,
      MessageKind.Assumption,
      `${day} start assumed ${options.defaultStart.display}`,
      { day, field: DayField.Start },
    ))
  } else {
    start = startField.status === 'blank' ? { status: 'blank' } : { status: 'invalid' }
  }
  const endField = readField(input.end, TimeRole.End, DayField.End)

  const startTime = start.status === 'entered' || start.status === 'defaulted' ? start.time : undefined
  const endTime = endField.status === 'parsed' ? endField.time : undefined

  const finish = (
    lunch: LunchState,
    hoursWorked: number,
    isAssumedFullDay = false,
  ): DayEvaluation => ({
    result: Object.freeze({
      day,
      normalizedStart: startTime,
      normalizedEnd: endTime,
      lunchMinutesUsed: lunch.status === 'valid' ? lunch.minutes : 0,
      hoursWorked,
      isAssumedFullDay,
      messages: Object.freeze([...messages]),
    }),
    start,
    lunch,
  })

  // Nothing entered: an assumed full day
  if (start.status === 'blank' && endField.status === 'blank') {
    return finish(checkUnusedLunch(), settings.assumedDayHours, true)
  }

  if (startTime && endTime) {
    const shiftMinutes = toMinutes(endTime.time) - toMinutes(startTime.time)
    if (shiftMinutes <= 0) {
      messages.push(createMessage(
        Severity.Error,
        MessageKind.Logic,
        `${day}: end before start (${startTime.display} to ${endTime.display})`,
        { day, field: DayField.End },
      ))
      return finish(settleLunch(), 0)
    }

    const lunch = resolveLunch()
    if (lunch.status !== 'valid') {
      return finish(lunch, 0)
    }
    if (lunch.minutes > shiftMinutes) {
      messages.push(createMessage(
        Severity.Error,
        MessageKind.Validation,
        `${day} lunch: lunch exceeds shift length`,
        { day, field: DayField.Lunch },
      ))
      // The lunch value itself is usable for Friday's projection
      return { ...finish({ status: 'invalid' }, 0), lunch }
    }

    const hoursWorked = minutesToQuarterHours(shiftMinutes - lunch.minutes, settings.roundingIncrementMinutes)
    return finish(lunch, hoursWorked)
  }

  if (endField.status === 'blank' && options.openEnded) {
    return finish(resolveLunch(), 0)
  }

  // One half of the pair is blank while the other one parsed
  if (startTime && endField.status === 'blank') {
    messages.push(missingPairMessage(input, DayField.End, DayField.Start))
  } else if (endTime && start.status === 'blank') {
    messages.push(missingPairMessage(input, DayField.Start, DayField.End))
  }
  return finish(settleLunch(), 0)
}

function missingPairMessage(input: DayInput, missing: DayField, entered: DayField): Message {
  return createMessage(
    Severity.Error,
    MessageKind.Parse,
    `${input.day} ${missing}: invalid time, required when ${entered} is entered`,
    { day: input.day, field: missing },
  )
}

export function processDay(input: DayInput, options: ProcessDayOptions = {}): DayResult {
  return evaluateDay(input, options).result
}


/**
 * Display state for a presentation layer
 *
 * Maps a WeekResult to the texts, tones and write-back values a form needs.
 * Tones: Error red, Warning yellow, Info green. Hours-to-40 turns green only
 * once the week is over target.
 */

import { DayField, Severity, Tone, Weekday } from './enums'
import { messagesBySeverity } from './result-aggregator'
import { formatHoursDisplay } from './time-utils'
import type { Message, WeekResult } from './timesheet-types'

export type FieldKey = `${Weekday}.${DayField}`

export interface DayViewModel {
  day: Weekday
  hoursText: string
  isAssumedFullDay: boolean
}

export interface Banner {
  severity: Severity
  tone: Tone
  lines: string[]
}

export interface TimesheetViewModel {
  totalHoursText: string
  hoursTo40Text: string
  hoursTo40Tone: Tone
  fridayClockOutText: string
  days: DayViewModel[]
  fieldValues: Partial<Record<FieldKey, string>>
  fieldTones: Partial<Record<FieldKey, Tone>>
  banners: Banner[]
}

export const SEVERITY_TONES: Record<Severity, Tone> = {
  [Severity.Error]: Tone.Error,
  [Severity.Warning]: Tone.Warning,
  [Severity.Info]: Tone.Success,
}

export const TONE_COLORS: Record<Tone, 'red' | 'yellow' | 'green' | 'default'> = {
  [Tone.Error]: 'red',
  [Tone.Warning]: 'yellow',
  [Tone.Success]: 'green',
  [Tone.Neutral]: 'default',
}

export function fieldKey(day: Weekday, field: DayField): FieldKey {
  return `${day}.${field}`
}

function buildFieldTones(messages: readonly Message[]): Partial<Record<FieldKey, Tone>> {
  const tones: Partial<Record<FieldKey, Tone>> = {}
  for (const message of messages) {
    if (!message.field || message.severity === Severity.Info) continue
    const key = fieldKey(message.field.day, message.field.field)
    if (tones[key] !== Tone.Error) {
      tones[key] = SEVERITY_TONES[message.severity]
    }
  }
  return tones
}

export function buildViewModel(result: WeekResult): TimesheetViewModel {
  const fieldValues: Partial<Record<FieldKey, string>> = {}
  for (const day of result.days) {
    if (day.normalizedStart) {
      fieldValues[fieldKey(day.day, DayField.Start)] = day.normalizedStart.display
    }
    if (day.normalizedEnd) {
      fieldValues[fieldKey(day.day, DayField.End)] = day.normalizedEnd.display
    }
  }

  const grouped = messagesBySeverity(result.messages)
  const banners: Banner[] = [Severity.Error, Severity.Warning, Severity.Info]
    .filter(severity => grouped[severity].length > 0)
    .map(severity => ({
      severity,
      tone: SEVERITY_TONES[severity],
      lines: grouped[severity].map(message => message.text),
    }))

  return {
    totalHoursText: formatHoursDisplay(result.totalHoursWorked),
    hoursTo40Text: formatHoursDisplay(result.hoursTo40),
    hoursTo40Tone: result.hoursTo40 < 0 ? Tone.Success : Tone.Neutral,
    fridayClockOutText: result.fridayClockOut?.display ?? '',
    days: result.days.map(day => ({
      day: day.day,
      hoursText: formatHoursDisplay(day.hoursWorked),
      isAssumedFullDay: day.isAssumedFullDay,
    })),
    fieldValues,
    fieldTones: buildFieldTones(result.messages),
    banners,
  }
}

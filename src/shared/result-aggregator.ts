/**
 * Message collection for a calculated week
 *
 * Messages are never merged or overwritten. Collapsing them into banners
 * is left to the presentation layer.
 */

import { WORK_WEEK } from './constants'
import { DayField, MessageKind, Severity, Weekday } from './enums'
import type { DayResult, Message } from './timesheet-types'

const SEVERITY_ORDER: readonly Severity[] = [Severity.Error, Severity.Warning, Severity.Info]

export function createMessage(
  severity: Severity,
  kind: MessageKind,
  text: string,
  field?: { day: Weekday; field: DayField },
): Message {
  return Object.freeze(field
    ? { severity, kind, text, field: Object.freeze({ ...field }) }
    : { severity, kind, text })
}

/**
 * Order every day and week message: Error, Warning, Info; within one
 * severity Monday to Friday, then week-level messages.
 */
export function aggregateMessages(
  days: readonly DayResult[],
  weekMessages: readonly Message[],
): Message[] {
  const dayRank = (day: Weekday): number => WORK_WEEK.indexOf(day)
  const orderedDays = [...days].sort((a, b) => dayRank(a.day) - dayRank(b.day))

  const aggregated: Message[] = []
  for (const severity of SEVERITY_ORDER) {
    for (const day of orderedDays) {
      aggregated.push(...day.messages.filter(message => message.severity === severity))
    }
    aggregated.push(...weekMessages.filter(message => message.severity === severity))
  }
  return aggregated
}

export function messagesBySeverity(
  messages: readonly Message[],
): Record<Severity, Message[]> {
  const grouped: Record<Severity, Message[]> = {
    [Severity.Error]: [],
    [Severity.Warning]: [],
    [Severity.Info]: [],
  }
  for (const message of messages) {
    grouped[message.severity].push(message)
  }
  return grouped
}

export function hasErrors(messages: readonly Message[]): boolean {
  return messages.some(message => message.severity === Severity.Error)
}

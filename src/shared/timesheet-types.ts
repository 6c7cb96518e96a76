/**
 * Core data model for the weekly timesheet engine
 *
 * Every value produced by the engine is plain data: results are returned,
 * never written back into the caller's input.
 */

import type { DayField, MessageKind, Severity, TimeParseFailure, Weekday } from './enums'

// =============================================================================
// Result
// =============================================================================

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

// =============================================================================
// Time values
// =============================================================================

export interface TimeOfDay {
  readonly hour: number   // 0-23
  readonly minute: number // 0-59
}

export interface ParsedTime {
  readonly time: TimeOfDay
  readonly display: string // "8:00 AM"
}

export interface TimeParseError {
  readonly reason: TimeParseFailure
  readonly raw: string
}

// =============================================================================
// Lunch
// =============================================================================

export interface LunchOutcome {
  readonly minutes: number
  readonly warning?: Message
}

export interface LunchValidationError {
  readonly raw: string
  readonly message: Message
}

// =============================================================================
// Messages
// =============================================================================

export interface FieldRef {
  readonly day: Weekday
  readonly field: DayField
}

export interface Message {
  readonly severity: Severity
  readonly kind: MessageKind
  readonly text: string
  readonly field?: FieldRef
}

// =============================================================================
// Day and week
// =============================================================================

export interface DayInput {
  readonly day: Weekday
  readonly start: string
  readonly end: string
  readonly lunch: string
}

export interface DayResult {
  readonly day: Weekday
  readonly normalizedStart?: ParsedTime
  readonly normalizedEnd?: ParsedTime
  readonly lunchMinutesUsed: number
  readonly hoursWorked: number
  readonly isAssumedFullDay: boolean
  readonly messages: readonly Message[]
}

export interface WeekResult {
  readonly days: readonly DayResult[]
  readonly preFridayTotal: number
  readonly totalHoursWorked: number
  readonly hoursTo40: number
  readonly fridayClockOut?: ParsedTime
  readonly overallMessages: readonly Message[]
  // Every message of the week, aggregated Error -> Warning -> Info
  readonly messages: readonly Message[]
}

// =============================================================================
// Errors
// =============================================================================

export type TimesheetErrorCode = 'WEEK_INPUT' | 'SETTINGS'

/**
 * Thrown only for misuse of the engine API. Entry mistakes in the
 * timesheet itself are reported as Messages.
 */
export class TimesheetError extends Error {
  readonly code: TimesheetErrorCode

  constructor(code: TimesheetErrorCode, message: string) {
    super(message)
    this.name = 'TimesheetError'
    this.code = code
  }
}

export class WeekInputError extends TimesheetError {
  constructor(message: string) {
    super('WEEK_INPUT', message)
    this.name = 'WeekInputError'
  }
}

export class SettingsError extends TimesheetError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super('SETTINGS', `Invalid timesheet settings: ${issues.join('; ')}`)
    this.name = 'SettingsError'
    this.issues = issues
  }
}

/**
 * Public API of the weekly timesheet engine
 */

export { calculateWeek, assertWorkWeek, projectFridayClockOut } from './shared/week-calculator'
export type { WorkWeekInput } from './shared/week-calculator'
export { processDay, evaluateDay } from './shared/day-processor'
export type { DayEvaluation, ProcessDayOptions, StartState, LunchState } from './shared/day-processor'
export { parseTime, isBlank, describeParseFailure } from './shared/time-parser'
export { validateLunch } from './shared/lunch-validator'
export { aggregateMessages, createMessage, hasErrors, messagesBySeverity } from './shared/result-aggregator'
export {
  createTimeOfDay,
  compareTimes,
  formatTimeOfDay,
  fromMinutes,
  isSameTime,
  toMinutes,
  toParsedTime,
} from './shared/time-of-day'
export { formatHoursDisplay, minutesToQuarterHours, roundMinutesToIncrement } from './shared/time-utils'
export {
  DEFAULT_TIMESHEET_SETTINGS,
  TimesheetSettingsSchema,
  loadTimesheetSettings,
  resolveSettings,
} from './shared/timesheet-settings'
export type { TimesheetSettings } from './shared/timesheet-settings'
export { buildViewModel, fieldKey, SEVERITY_TONES, TONE_COLORS } from './shared/timesheet-view-model'
export type { Banner, DayViewModel, FieldKey, TimesheetViewModel } from './shared/timesheet-view-model'
export * from './shared/enums'
export { WORK_WEEK, TIMESHEET_DEFAULTS } from './shared/constants'
export { TimesheetError, WeekInputError, SettingsError, ok, err } from './shared/timesheet-types'
export type {
  DayInput,
  DayResult,
  FieldRef,
  LunchOutcome,
  LunchValidationError,
  Message,
  ParsedTime,
  Result,
  TimeOfDay,
  TimeParseError,
  WeekResult,
} from './shared/timesheet-types'
export { createLogger, LogLevel } from './logging'
export type { ILogger, LogEntry, LoggerConfig } from './logging'

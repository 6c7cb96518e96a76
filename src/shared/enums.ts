/**
 * Centralized enums for the timesheet engine
 * Use these instead of hardcoded strings so switches stay exhaustive.
 */

// Working days, in calculation order
export enum Weekday {
  Monday = 'Monday',
  Tuesday = 'Tuesday',
  Wednesday = 'Wednesday',
  Thursday = 'Thursday',
  Friday = 'Friday',
}

// Which half of a shift a time string belongs to (drives the AM/PM default)
export enum TimeRole {
  Start = 'start',
  End = 'end',
}

// Input fields of a single day row
export enum DayField {
  Start = 'start',
  End = 'end',
  Lunch = 'lunch',
}

export enum Severity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

// What produced a message
export enum MessageKind {
  Parse = 'parse',
  Validation = 'validation',
  Logic = 'logic',
  Projection = 'projection',
  Assumption = 'assumption',
  Milestone = 'milestone',
}

export enum TimeParseFailure {
  Blank = 'blank',
  Malformed = 'malformed',
  HourOutOfRange = 'hour-out-of-range',
  MinuteOutOfRange = 'minute-out-of-range',
}

// Display tones consumed by a presentation layer
export enum Tone {
  Error = 'error',
  Warning = 'warning',
  Success = 'success',
  Neutral = 'neutral',
}

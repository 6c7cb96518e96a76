import { MINUTES_PER_HOUR, TIMESHEET_DEFAULTS } from './constants'

/**
 * Round a duration to the nearest increment (15 minutes by default).
 * Ties round up.
 */
export function roundMinutesToIncrement(
  minutes: number,
  increment: number = TIMESHEET_DEFAULTS.ROUNDING_INCREMENT_MINUTES,
): number {
  return Math.floor(minutes / increment + 0.5) * increment
}

/**
 * Convert minutes to hours, rounded to the nearest quarter hour
 */
export function minutesToQuarterHours(
  minutes: number,
  increment: number = TIMESHEET_DEFAULTS.ROUNDING_INCREMENT_MINUTES,
): number {
  return roundMinutesToIncrement(minutes, increment) / MINUTES_PER_HOUR
}

/**
 * Format hours without trailing zeros: 8 -> "8", 7.5 -> "7.5", 8.25 -> "8.25"
 */
export function formatHoursDisplay(hours: number): string {
  const fixed = hours.toFixed(2).replace(/\.?0+$/, '')
  return fixed === '-0' ? '0' : fixed
}

/**
 * Lunch duration for the report: 45 -> "45m", 60 -> "1h", 90 -> "1h 30m"
 */
export function formatLunchDuration(lunchMinutes: number): string {
  const hours = Math.floor(lunchMinutes / MINUTES_PER_HOUR)
  const rest = lunchMinutes % MINUTES_PER_HOUR
  if (hours === 0) return `${rest}m`
  return rest === 0 ? `${hours}h` : `${hours}h ${rest}m`
}

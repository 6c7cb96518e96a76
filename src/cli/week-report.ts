/**
 * Plain-text weekly report for the terminal
 */

import { Chalk } from 'chalk'
import type { ChalkInstance } from 'chalk'
import { Severity } from '@shared/enums'
import type { Tone } from '@shared/enums'
import { formatLunchDuration } from '@shared/time-utils'
import { TONE_COLORS, buildViewModel } from '@shared/timesheet-view-model'
import type { TimesheetViewModel } from '@shared/timesheet-view-model'
import type { WeekResult } from '@shared/timesheet-types'

export interface ReportOptions {
  colors?: boolean
}

const BANNER_TITLES: Record<Severity, string> = {
  [Severity.Error]: 'Errors',
  [Severity.Warning]: 'Warnings',
  [Severity.Info]: 'Info',
}

const COLUMN_WIDTHS = [11, 10, 10, 7] as const

function paint(chalk: ChalkInstance, tone: Tone, text: string): string {
  const color = TONE_COLORS[tone]
  return color === 'default' ? text : chalk[color](text)
}

function row(cells: readonly string[]): string {
  return cells
    .map((cell, index) => {
      const width = COLUMN_WIDTHS[index]
      return width === undefined ? cell : cell.padEnd(width)
    })
    .join('')
    .trimEnd()
}

export function renderWeekReport(result: WeekResult, options: ReportOptions = {}): string {
  const chalk = new Chalk({ level: options.colors ? 1 : 0 })
  const view: TimesheetViewModel = buildViewModel(result)
  const lines: string[] = []

  lines.push(chalk.bold(row(['Day', 'Start', 'End', 'Lunch', 'Hours'])))
  result.days.forEach((day, index) => {
    const hoursText = view.days[index]?.hoursText ?? ''
    lines.push(row([
      day.day,
      day.normalizedStart?.display ?? '-',
      day.normalizedEnd?.display ?? '-',
      formatLunchDuration(day.lunchMinutesUsed),
      day.isAssumedFullDay ? `${hoursText} (assumed)` : hoursText,
    ]))
  })

  lines.push('')
  lines.push(`Total hours worked: ${view.totalHoursText}`)
  lines.push(`Hours to 40: ${paint(chalk, view.hoursTo40Tone, view.hoursTo40Text)}`)
  lines.push(`Friday clock-out: ${view.fridayClockOutText || '-'}`)

  for (const banner of view.banners) {
    lines.push('')
    lines.push(paint(chalk, banner.tone, `${BANNER_TITLES[banner.severity]}:`))
    for (const line of banner.lines) {
      lines.push(`  ${paint(chalk, banner.tone, line)}`)
    }
  }

  return lines.join('\n')
}

/**
 * Machine-readable report: the raw result plus its display state
 */
export function renderWeekJson(result: WeekResult): string {
  return JSON.stringify({ result, view: buildViewModel(result) }, null, 2)
}

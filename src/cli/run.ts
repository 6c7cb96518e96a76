/**
 * timesheet-calc command: computes the week from per-day arguments or a
 * JSON file and prints the report.
 *
 * Exit codes: 0 success, 1 the timesheet has errors, 2 bad usage or settings.
 */

import * as fs from 'fs'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import { LogLevel, StructuredLogger, createLogger } from '@/logging'
import type { LogEntry } from '@/logging'
import { WORK_WEEK } from '@shared/constants'
import { logger } from '@shared/logger'
import { hasErrors } from '@shared/result-aggregator'
import { loadTimesheetSettings } from '@shared/timesheet-settings'
import { TimesheetError } from '@shared/timesheet-types'
import { calculateWeek } from '@shared/week-calculator'
import {
  DAY_OPTION_KEYS,
  DayArgumentError,
  buildWeekInput,
  parseDayArgument,
  parseWeekFile,
} from './day-args'
import type { DayOptionKey, RawDayFields, WeekFile } from './day-args'
import { renderWeekJson, renderWeekReport } from './week-report'

export const EXIT_CODES = {
  OK: 0,
  TIMESHEET_ERRORS: 1,
  USAGE: 2,
} as const

export interface CliIO {
  stdout: (text: string) => void
  stderr: (text: string) => void
  readFile: (path: string) => string
  env: NodeJS.ProcessEnv
  colors: boolean
}

export const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  readFile: path => fs.readFileSync(path, 'utf8'),
  env: process.env,
  colors: Boolean(process.stdout.isTTY),
}

type CliOptions = Partial<Record<DayOptionKey, RawDayFields>> & {
  file?: string
  json?: boolean
  verbose?: boolean
  color?: boolean
}

function dayOption(value: string): RawDayFields {
  try {
    return parseDayArgument(value)
  } catch (error) {
    if (error instanceof DayArgumentError) {
      throw new InvalidArgumentError(error.message)
    }
    throw error
  }
}

function readWeekFile(path: string, io: CliIO): WeekFile {
  let json: unknown
  try {
    json = JSON.parse(io.readFile(path))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new DayArgumentError(`Cannot read week file ${path}: ${reason}`)
  }
  return parseWeekFile(json)
}

/**
 * Print the buffered log entries of this run to stderr
 */
function writeLogTrail(entries: readonly LogEntry[], io: CliIO, colors: boolean): void {
  const structured = new StructuredLogger()
  for (const entry of entries) {
    io.stderr(`${structured.toConsole(entry, colors)}\n`)
  }
}

export function buildProgram(io: CliIO): Command {
  const program = new Command()
    .name('timesheet-calc')
    .description('Weekly hours worked, hours to 40 and the Friday clock-out time')
    .option('-f, --file <path>', 'JSON file with start/end/lunch per weekday')
    .option('--json', 'Print the result as JSON')
    .option('-v, --verbose', 'Print the debug log of the run to stderr')
    .option('--no-color', 'Disable colored output')
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    })

  for (const day of WORK_WEEK) {
    program.option(
      `--${DAY_OPTION_KEYS[day]} <start,end,lunch>`,
      `${day} times, e.g. "8:00 AM,5:00 PM,60"`,
      dayOption,
    )
  }

  return program
}

export function runTimesheetCli(argv: readonly string[], io: CliIO = defaultIO): number {
  const program = buildProgram(io)

  try {
    program.parse([...argv], { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.USAGE
    }
    throw error
  }

  const options = program.opts<CliOptions>()
  const colors = io.colors && options.color !== false
  const appLogger = createLogger()
  if (options.verbose) {
    appLogger.configure({ level: LogLevel.DEBUG })
  }
  const log = logger.cli

  try {
    const settings = loadTimesheetSettings(io.env)
    const file = options.file ? readWeekFile(options.file, io) : undefined
    const week = buildWeekInput(file, options)
    const result = calculateWeek(week, settings)

    const output = options.json
      ? renderWeekJson(result)
      : renderWeekReport(result, { colors })
    io.stdout(`${output}\n`)

    log.debug('Report printed', { messages: result.messages.length })
    return hasErrors(result.messages) ? EXIT_CODES.TIMESHEET_ERRORS : EXIT_CODES.OK
  } catch (error) {
    if (error instanceof TimesheetError || error instanceof DayArgumentError) {
      log.error('Timesheet calculation failed', error)
      io.stderr(`error: ${error.message}\n`)
      return EXIT_CODES.USAGE
    }
    throw error
  } finally {
    if (options.verbose) {
      writeLogTrail(appLogger.dumpBuffer(), io, colors)
    }
  }
}

#!/usr/bin/env npx tsx
/**
 * Weekly timesheet calculator
 *
 * Usage:
 *   npx tsx scripts/timesheet-calc.ts --monday "8:00 AM,5:00 PM,60" --friday "8a"
 *   npx tsx scripts/timesheet-calc.ts --file week.json --json
 */

import { runTimesheetCli } from '@/cli/run'

process.exitCode = runTimesheetCli(process.argv.slice(2))

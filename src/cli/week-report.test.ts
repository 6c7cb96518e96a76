import { describe, it, expect } from 'vitest'
import { Weekday } from '@shared/enums'
import { calculateWeek } from '@shared/week-calculator'
import { createStandardWeek, createWeek } from '@/test/factories'
import { renderWeekJson, renderWeekReport } from './week-report'

describe('week-report', () => {
  describe('renderWeekReport', () => {
    it('should render the table, totals and banners', () => {
      const result = calculateWeek(createStandardWeek(['8:00 AM', '5:00 PM', '60'], ['8:00 AM', '', '']))

      expect(renderWeekReport(result).split('\n')).toEqual([
        'Day        Start     End       Lunch  Hours',
        'Monday     8:00 AM   5:00 PM   1h     8',
        'Tuesday    8:00 AM   5:00 PM   1h     8',
        'Wednesday  8:00 AM   5:00 PM   1h     8',
        'Thursday   8:00 AM   5:00 PM   1h     8',
        'Friday     8:00 AM   -         1h     0',
        '',
        'Total hours worked: 32',
        'Hours to 40: 8',
        'Friday clock-out: 5:00 PM',
        '',
        'Warnings:',
        '  Friday: lunch assumed 60 minutes',
      ])
    })

    it('should mark assumed days and list banners by severity', () => {
      const result = calculateWeek(createWeek({ [Weekday.Friday]: ['noon', '', ''] }))
      const lines = renderWeekReport(result).split('\n')

      expect(lines[1]).toBe('Monday     -         -         0m     8 (assumed)')
      expect(lines.slice(9)).toEqual([
        'Friday clock-out: -',
        '',
        'Errors:',
        '  Friday start: invalid time "noon" (not a recognized time)',
        '  Friday clock-out unavailable: Friday start is invalid',
        '',
        'Warnings:',
        '  Friday: lunch assumed 60 minutes',
      ])
    })

    it('should color hours to 40 when colors are on', () => {
      const result = calculateWeek(createStandardWeek(['7', '7', '60']))
      const lines = renderWeekReport(result, { colors: true }).split('\n')

      expect(lines).toContain('Hours to 40: \u001b[32m-4\u001b[39m')
      expect(lines[0]?.startsWith('\u001b[1m')).toBe(true)
    })

    it('should not emit escape codes without colors', () => {
      const result = calculateWeek(createStandardWeek(['7', '7', '60']))

      expect(renderWeekReport(result)).not.toContain('\u001b[')
    })
  })

  describe('renderWeekJson', () => {
    it('should include the result and its view', () => {
      const result = calculateWeek(createStandardWeek(['8', '5', '60'], ['8', '', '60']))

      const parsed: unknown = JSON.parse(renderWeekJson(result))

      expect(parsed).toMatchObject({
        result: {
          preFridayTotal: 32,
          hoursTo40: 8,
          fridayClockOut: { time: { hour: 17, minute: 0 }, display: '5:00 PM' },
          messages: [],
        },
        view: {
          totalHoursText: '32',
          fridayClockOutText: '5:00 PM',
          banners: [],
        },
      })
    })
  })
})

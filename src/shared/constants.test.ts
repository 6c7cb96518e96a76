import { describe, it, expect } from 'vitest'
import { DATE_FORMATS, MINUTES_PER_DAY, TIMESHEET_DEFAULTS, WORK_WEEK } from './constants'
import { Weekday } from './enums'

describe('constants', () => {
  describe('WORK_WEEK', () => {
    it('should run Monday to Friday', () => {
      expect(WORK_WEEK[0]).toBe(Weekday.Monday)
      expect(WORK_WEEK[WORK_WEEK.length - 1]).toBe(Weekday.Friday)
      expect(WORK_WEEK).toHaveLength(5)
    })
  })

  describe('TIMESHEET_DEFAULTS', () => {
    it('should describe the standard week', () => {
      expect(TIMESHEET_DEFAULTS.WEEKLY_TARGET_HOURS).toBe(40)
      expect(TIMESHEET_DEFAULTS.ASSUMED_DAY_HOURS * 5).toBe(TIMESHEET_DEFAULTS.WEEKLY_TARGET_HOURS)
      expect(TIMESHEET_DEFAULTS.ROUNDING_INCREMENT_MINUTES).toBe(15)
    })
  })

  it('should define the clock constants', () => {
    expect(MINUTES_PER_DAY).toBe(1440)
    expect(DATE_FORMATS.DISPLAY_TIME).toBe('h:mm A')
  })
})

import { describe, it, expect } from 'vitest'
import {
  formatHoursDisplay,
  formatLunchDuration,
  minutesToQuarterHours,
  roundMinutesToIncrement,
} from './time-utils'

describe('time-utils', () => {
  describe('roundMinutesToIncrement', () => {
    it('should round to the nearest quarter hour by default', () => {
      expect(roundMinutesToIncrement(480)).toBe(480)
      expect(roundMinutesToIncrement(487)).toBe(480)
      expect(roundMinutesToIncrement(488)).toBe(495)
      expect(roundMinutesToIncrement(7)).toBe(0)
    })

    it('should round ties up', () => {
      expect(roundMinutesToIncrement(7.5)).toBe(15)
      expect(roundMinutesToIncrement(22.5)).toBe(30)
    })

    it('should support other increments', () => {
      expect(roundMinutesToIncrement(14, 6)).toBe(12)
      expect(roundMinutesToIncrement(15, 6)).toBe(18)
    })
  })

  describe('minutesToQuarterHours', () => {
    it('should convert minutes to rounded hours', () => {
      expect(minutesToQuarterHours(480)).toBe(8)
      expect(minutesToQuarterHours(490)).toBe(8.25)
      expect(minutesToQuarterHours(502)).toBe(8.25)
      expect(minutesToQuarterHours(503)).toBe(8.5)
    })
  })

  describe('formatHoursDisplay', () => {
    it('should trim trailing zeros', () => {
      expect(formatHoursDisplay(8)).toBe('8')
      expect(formatHoursDisplay(8.5)).toBe('8.5')
      expect(formatHoursDisplay(8.25)).toBe('8.25')
      expect(formatHoursDisplay(40)).toBe('40')
      expect(formatHoursDisplay(100)).toBe('100')
      expect(formatHoursDisplay(0)).toBe('0')
    })

    it('should keep the sign of negative values', () => {
      expect(formatHoursDisplay(-4)).toBe('-4')
      expect(formatHoursDisplay(-0.25)).toBe('-0.25')
    })
  })

  describe('formatLunchDuration', () => {
    it('should format a lunch as hours and minutes', () => {
      expect(formatLunchDuration(0)).toBe('0m')
      expect(formatLunchDuration(45)).toBe('45m')
      expect(formatLunchDuration(60)).toBe('1h')
      expect(formatLunchDuration(90)).toBe('1h 30m')
    })

    it('should show whole hours past the first', () => {
      expect(formatLunchDuration(120)).toBe('2h')
      expect(formatLunchDuration(1440)).toBe('24h')
    })
  })
})

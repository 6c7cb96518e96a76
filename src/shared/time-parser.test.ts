import { describe, it, expect } from 'vitest'
import { TimeParseFailure, TimeRole } from './enums'
import { describeParseFailure, isBlank, parseTime } from './time-parser'

function parsedOrFail(raw: string, role: TimeRole) {
  const result = parseTime(raw, role)
  if (!result.ok) {
    throw new Error(`Expected "${raw}" to parse, got ${result.error.reason}`)
  }
  return result.value
}

function failureOf(raw: string, role: TimeRole = TimeRole.Start) {
  const result = parseTime(raw, role)
  if (result.ok) {
    throw new Error(`Expected "${raw}" to fail, got ${result.value.display}`)
  }
  return result.error
}

describe('time-parser', () => {
  describe('parseTime', () => {
    it('should read a bare hour as AM for a start time', () => {
      const parsed = parsedOrFail('8', TimeRole.Start)

      expect(parsed.time).toEqual({ hour: 8, minute: 0 })
      expect(parsed.display).toBe('8:00 AM')
    })

    it('should read a bare hour as PM for an end time', () => {
      const parsed = parsedOrFail('8', TimeRole.End)

      expect(parsed.time).toEqual({ hour: 20, minute: 0 })
      expect(parsed.display).toBe('8:00 PM')
    })

    it('should honor an explicit meridiem over the role default', () => {
      expect(parsedOrFail('8a', TimeRole.End).display).toBe('8:00 AM')
      expect(parsedOrFail('8 PM', TimeRole.Start).display).toBe('8:00 PM')
      expect(parsedOrFail('4:35 pm', TimeRole.End).time).toEqual({ hour: 16, minute: 35 })
      expect(parsedOrFail('8:30 a.m.', TimeRole.End).time).toEqual({ hour: 8, minute: 30 })
      expect(parsedOrFail('11:45P', TimeRole.Start).time).toEqual({ hour: 23, minute: 45 })
    })

    it('should keep 24-hour values as entered', () => {
      const asEnd = parsedOrFail('16:00', TimeRole.End)
      const asStart = parsedOrFail('16:00', TimeRole.Start)

      expect(asEnd.time).toEqual({ hour: 16, minute: 0 })
      expect(asEnd.display).toBe('4:00 PM')
      expect(asStart.time).toEqual({ hour: 16, minute: 0 })
    })

    it('should treat hour zero as midnight for either role', () => {
      expect(parsedOrFail('0:15', TimeRole.Start).display).toBe('12:15 AM')
      expect(parsedOrFail('00:15', TimeRole.End).time).toEqual({ hour: 0, minute: 15 })
    })

    it('should apply the role default to a bare twelve', () => {
      expect(parsedOrFail('12', TimeRole.Start).time).toEqual({ hour: 0, minute: 0 })
      expect(parsedOrFail('12', TimeRole.Start).display).toBe('12:00 AM')
      expect(parsedOrFail('12', TimeRole.End).time).toEqual({ hour: 12, minute: 0 })
      expect(parsedOrFail('12', TimeRole.End).display).toBe('12:00 PM')
    })

    it('should map 12 AM to midnight and 12 PM to noon', () => {
      expect(parsedOrFail('12 AM', TimeRole.End).time).toEqual({ hour: 0, minute: 0 })
      expect(parsedOrFail('12pm', TimeRole.Start).time).toEqual({ hour: 12, minute: 0 })
    })

    it('should apply the role default to a zero-padded hour', () => {
      expect(parsedOrFail('08:00', TimeRole.End).display).toBe('8:00 PM')
      expect(parsedOrFail('08:00', TimeRole.Start).display).toBe('8:00 AM')
    })

    it('should read minutes written without a colon', () => {
      expect(parsedOrFail('0830', TimeRole.Start).display).toBe('8:30 AM')
      expect(parsedOrFail('830', TimeRole.End).time).toEqual({ hour: 20, minute: 30 })
      expect(parsedOrFail('1730', TimeRole.End).display).toBe('5:30 PM')
      expect(parsedOrFail('0830pm', TimeRole.Start).time).toEqual({ hour: 20, minute: 30 })
      expect(failureOf('2400').reason).toBe(TimeParseFailure.HourOutOfRange)
    })

    it('should accept a trailing colon as the top of the hour', () => {
      expect(parsedOrFail('8:', TimeRole.Start).display).toBe('8:00 AM')
      expect(parsedOrFail('5: pm', TimeRole.Start).time).toEqual({ hour: 17, minute: 0 })
    })

    it('should ignore surrounding whitespace', () => {
      expect(parsedOrFail('  9:05  ', TimeRole.Start).display).toBe('9:05 AM')
    })

    it('should report blank input', () => {
      expect(failureOf('').reason).toBe(TimeParseFailure.Blank)
      expect(failureOf('   ').reason).toBe(TimeParseFailure.Blank)
    })

    it('should report text that is not a time', () => {
      expect(failureOf('asdf').reason).toBe(TimeParseFailure.Malformed)
      expect(failureOf('8:5').reason).toBe(TimeParseFailure.Malformed)
      expect(failureOf('12345').reason).toBe(TimeParseFailure.Malformed)
      expect(failureOf('-8').reason).toBe(TimeParseFailure.Malformed)
      expect(failureOf('8:00 xm').reason).toBe(TimeParseFailure.Malformed)
    })

    it('should report hours outside the clock', () => {
      expect(failureOf('24').reason).toBe(TimeParseFailure.HourOutOfRange)
      expect(failureOf('25:00', TimeRole.End).reason).toBe(TimeParseFailure.HourOutOfRange)
      expect(failureOf('13 PM').reason).toBe(TimeParseFailure.HourOutOfRange)
      expect(failureOf('0am').reason).toBe(TimeParseFailure.HourOutOfRange)
    })

    it('should report minutes outside the hour', () => {
      expect(failureOf('8:60').reason).toBe(TimeParseFailure.MinuteOutOfRange)
      expect(failureOf('23:99', TimeRole.End).reason).toBe(TimeParseFailure.MinuteOutOfRange)
    })

    it('should keep the raw text on failure', () => {
      expect(failureOf(' asdf ').raw).toBe(' asdf ')
    })
  })

  describe('isBlank', () => {
    it('should detect whitespace-only input', () => {
      expect(isBlank('')).toBe(true)
      expect(isBlank(' \t ')).toBe(true)
      expect(isBlank('8')).toBe(false)
    })
  })

  describe('describeParseFailure', () => {
    it('should describe each failure reason', () => {
      expect(describeParseFailure({ reason: TimeParseFailure.Blank, raw: '' })).toBe('no time entered')
      expect(describeParseFailure({ reason: TimeParseFailure.Malformed, raw: 'x' })).toBe('not a recognized time')
      expect(describeParseFailure({ reason: TimeParseFailure.HourOutOfRange, raw: '24' })).toBe('hour out of range')
      expect(describeParseFailure({ reason: TimeParseFailure.MinuteOutOfRange, raw: '8:61' })).toBe('minute out of range')
    })
  })
})

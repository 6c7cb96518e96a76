import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ConsoleTransport } from './ConsoleTransport'
import { LogLevel } from '../types'
import type { LogEntry } from '../types'

describe('ConsoleTransport', () => {
  const createEntry = (level: LogLevel, message: string): LogEntry => ({
    level,
    message,
    context: { timestamp: '2026-01-05T08:00:00.000Z' },
  })

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('write', () => {
    it('should route entries by level', () => {
      const transport = new ConsoleTransport({ colors: false })

      transport.write([
        createEntry(LogLevel.ERROR, 'failed'),
        createEntry(LogLevel.WARN, 'careful'),
        createEntry(LogLevel.INFO, 'done'),
      ])

      expect(console.error).toHaveBeenCalledWith('[ERROR] 2026-01-05T08:00:00.000Z failed')
      expect(console.warn).toHaveBeenCalledWith('[WARN ] 2026-01-05T08:00:00.000Z careful')
      expect(console.log).toHaveBeenCalledWith('[INFO ] 2026-01-05T08:00:00.000Z done')
    })

    it('should send every level to stderr when asked', () => {
      const transport = new ConsoleTransport({ colors: false, stderrOnly: true })

      transport.write([createEntry(LogLevel.INFO, 'done'), createEntry(LogLevel.DEBUG, 'detail')])

      expect(console.error).toHaveBeenCalledTimes(2)
      expect(console.log).not.toHaveBeenCalled()
    })

    it('should skip entries below the minimum level', () => {
      const transport = new ConsoleTransport({ colors: false, minLevel: LogLevel.WARN })

      transport.write([createEntry(LogLevel.INFO, 'done'), createEntry(LogLevel.WARN, 'careful')])

      expect(console.log).not.toHaveBeenCalled()
      expect(console.warn).toHaveBeenCalledTimes(1)
    })

    it('should write nothing when disabled', () => {
      const transport = new ConsoleTransport({ enabled: false })

      transport.write([createEntry(LogLevel.ERROR, 'failed')])

      expect(console.error).not.toHaveBeenCalled()
    })
  })
})

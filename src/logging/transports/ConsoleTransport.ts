/**
 * Console transport for human-readable log lines
 */

import { LogLevel } from '../types'
import type { LogEntry, LogTransport } from '../types'
import { StructuredLogger } from '../core/StructuredLogger'

export interface ConsoleTransportOptions {
  enabled?: boolean
  minLevel?: LogLevel
  // Send every level to stderr so stdout stays free for program output
  stderrOnly?: boolean
  colors?: boolean
}

export class ConsoleTransport implements LogTransport {
  private enabled: boolean
  private minLevel: LogLevel
  private stderrOnly: boolean
  private colors: boolean
  private structuredLogger: StructuredLogger

  constructor(options: ConsoleTransportOptions = {}) {
    this.enabled = options.enabled ?? true
    this.minLevel = options.minLevel ?? LogLevel.TRACE
    this.stderrOnly = options.stderrOnly ?? false
    this.colors = options.colors ?? true
    this.structuredLogger = new StructuredLogger()
  }

  write(entries: LogEntry[]): void {
    if (!this.enabled) return

    for (const entry of entries) {
      if (entry.level > this.minLevel) continue

      const formatted = this.structuredLogger.toConsole(entry, this.colors)

      if (this.stderrOnly) {
        console.error(formatted)
        continue
      }

      switch (entry.level) {
        case LogLevel.ERROR:
          console.error(formatted)
          break
        case LogLevel.WARN:
          console.warn(formatted)
          break
        default:
          console.log(formatted)
      }
    }
  }
}

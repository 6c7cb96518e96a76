/**
 * Base logger implementation with all core features
 */

import { LogLevel } from '../types'
import type {
  ILogger,
  LazyLogData,
  LogData,
  LogEntry,
  LogMethod,
  LogTransport,
  LoggerConfig,
} from '../types'
import { RingBuffer } from './RingBuffer'
import { StructuredLogger } from './StructuredLogger'

export abstract class Logger implements ILogger {
  protected config: LoggerConfig
  protected ringBuffer: RingBuffer
  protected structuredLogger: StructuredLogger
  protected transports: LogTransport[] = []
  protected context: LogData = {}

  constructor(config: LoggerConfig) {
    this.config = { ...config }
    this.structuredLogger = new StructuredLogger()
    this.ringBuffer = new RingBuffer({ size: config.ringBufferSize })
  }

  /**
   * Build an empty logger of the concrete type, used for children
   */
  protected abstract spawn(): Logger

  /**
   * Log an error
   */
  error = (message: string, errorOrData?: Error | LogData | LazyLogData, additionalData?: LogData): void => {
    if (errorOrData instanceof Error) {
      this.log(LogLevel.ERROR, message, additionalData, errorOrData)
    } else {
      this.log(LogLevel.ERROR, message, errorOrData)
    }
  }

  warn: LogMethod = (message, data) => {
    this.log(LogLevel.WARN, message, data)
  }

  info: LogMethod = (message, data) => {
    this.log(LogLevel.INFO, message, data)
  }

  debug: LogMethod = (message, data) => {
    this.log(LogLevel.DEBUG, message, data)
  }

  trace: LogMethod = (message, data) => {
    this.log(LogLevel.TRACE, message, data)
  }

  /**
   * Core logging method
   */
  protected log(
    level: LogLevel,
    message: string,
    data?: LogData | LazyLogData,
    error?: Error,
  ): void {
    if (level > this.config.level) {
      return
    }

    // Lazy data is only evaluated once the level check passed
    const evaluatedData = typeof data === 'function' ? data() : data

    const entry = this.structuredLogger.format(level, message, { ...this.context, ...evaluatedData }, error)

    this.ringBuffer.push(entry)
    this.write([entry])
  }

  /**
   * Create a child logger with additional context. Children share the
   * parent's configuration, buffer and transports.
   */
  child(context: LogData): ILogger {
    const childLogger = this.spawn()
    childLogger.config = this.config
    childLogger.context = { ...this.context, ...context }
    childLogger.transports = this.transports
    childLogger.ringBuffer = this.ringBuffer
    childLogger.structuredLogger = this.structuredLogger
    return childLogger
  }

  dumpBuffer(): LogEntry[] {
    return this.ringBuffer.getAll()
  }

  /**
   * Update configuration in place so existing children follow it
   */
  configure(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config)
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport)
  }

  protected write(entries: LogEntry[]): void {
    for (const transport of this.transports) {
      try {
        transport.write(entries)
      } catch (error) {
        // Don't log transport errors to avoid infinite loop
        console.error('Transport error:', error)
      }
    }
  }

  /**
   * Cleanup on shutdown
   */
  shutdown(): void {
    for (const transport of this.transports) {
      transport.close?.()
    }
  }
}

/**
 * Logging system type definitions
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4,
}

export type LogData = Record<string, unknown>

export interface LogContext {
  timestamp: string
  pid?: number
  source?: {
    file: string
    line: number
    function?: string
  }
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  message: string
  data?: LogData
  context: LogContext
  error?: {
    message: string
    stack?: string
    code?: string
  }
}

export interface LoggerConfig {
  level: LogLevel
  ringBufferSize: number
  environment: 'development' | 'test' | 'production'
}

export interface RingBufferOptions {
  size: number
}

export interface LogTransport {
  write(entries: LogEntry[]): void
  close?(): void
}

export type LazyLogData = () => LogData
export type LogMethod = (message: string, data?: LogData | LazyLogData) => void

export interface ILogger {
  error(message: string, errorOrData?: Error | LogData | LazyLogData, additionalData?: LogData): void
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod

  // Child logger with additional context
  child(context: LogData): ILogger

  // Dump ring buffer
  dumpBuffer(): LogEntry[]

  // Update configuration
  configure(config: Partial<LoggerConfig>): void
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'trace'

export const LOG_LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
  trace: LogLevel.TRACE,
}

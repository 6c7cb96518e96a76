/**
 * JSON structured logging with automatic context injection
 */

import { LogLevel } from '../types'
import type { LogContext, LogData, LogEntry } from '../types'

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'authorization']

function hasErrorCode(error: Error): error is Error & { code: string } {
  return 'code' in error && typeof error.code === 'string'
}

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase()
  return SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redactValue)
  if (typeof value === 'object' && value !== null) return redactObject(value)
  return value
}

function redactObject(value: object): LogData {
  const result: LogData = {}
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? '[REDACTED]' : redactValue(nested)
  }
  return result
}

export class StructuredLogger {
  /**
   * Format a log entry with full context
   */
  format(
    level: LogLevel,
    message: string,
    data?: LogData,
    error?: Error,
  ): LogEntry {
    const entry: LogEntry = {
      level,
      message,
      data: this.sanitizeData(data),
      context: this.buildContext(),
    }

    if (error) {
      entry.error = {
        message: error.message,
        stack: error.stack,
        code: hasErrorCode(error) ? error.code : undefined,
      }
    }

    return entry
  }

  private buildContext(): LogContext {
    const context: LogContext = {
      timestamp: new Date().toISOString(),
      pid: process.pid,
    }

    const source = this.extractSource()
    if (source) {
      context.source = source
    }

    return context
  }

  /**
   * Extract source file and line number from stack trace
   */
  private extractSource(): LogContext['source'] | undefined {
    const stack = new Error().stack
    if (!stack) return undefined

    // Skip the Error line and the logger's own frames
    const lines = stack.split('\n').slice(4)

    for (const line of lines) {
      const match = line.match(/at\s+(?:.*?\s+)?\(?(.+):(\d+):(\d+)\)?/)
      if (!match) continue

      const [, filePath, lineNumber] = match
      if (!filePath || !lineNumber) continue
      if (filePath.includes('node_modules') || filePath.includes('logging/') || filePath.startsWith('node:')) {
        continue
      }

      const funcMatch = line.match(/at\s+([^\s(]+)\s+\(/)
      const fileName = filePath.split(/[\\/]/).pop() ?? filePath

      return {
        file: fileName,
        line: parseInt(lineNumber, 10),
        function: funcMatch?.[1],
      }
    }

    return undefined
  }

  /**
   * Redact values stored under sensitive keys, at any depth
   */
  sanitizeData(data?: LogData): LogData | undefined {
    return data ? redactObject(data) : undefined
  }

  /**
   * Format log entry for console output
   */
  toConsole(entry: LogEntry, useColor = true): string {
    const levelColors: Record<LogLevel, string> = {
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.WARN]: '\x1b[33m',  // Yellow
      [LogLevel.INFO]: '\x1b[36m',  // Cyan
      [LogLevel.DEBUG]: '\x1b[90m', // Gray
      [LogLevel.TRACE]: '\x1b[37m', // White
    }

    const levelNames: Record<LogLevel, string> = {
      [LogLevel.ERROR]: 'ERROR',
      [LogLevel.WARN]: 'WARN ',
      [LogLevel.INFO]: 'INFO ',
      [LogLevel.DEBUG]: 'DEBUG',
      [LogLevel.TRACE]: 'TRACE',
    }

    const levelName = levelNames[entry.level]
    const label = useColor ? `${levelColors[entry.level]}[${levelName}]\x1b[0m` : `[${levelName}]`

    let output = `${label} ${entry.context.timestamp} `

    if (entry.context.source) {
      output += `[${entry.context.source.file}:${entry.context.source.line}] `
    }

    output += entry.message

    if (entry.data && Object.keys(entry.data).length > 0) {
      output += ' ' + JSON.stringify(entry.data)
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`
      if (entry.error.stack) {
        output += `\n  ${entry.error.stack.split('\n').join('\n  ')}`
      }
    }

    return output
  }
}

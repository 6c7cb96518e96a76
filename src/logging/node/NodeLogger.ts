/**
 * Logger for Node.js processes (library use and the CLI)
 */

import { Logger } from '../core/Logger'
import { ConsoleTransport } from '../transports/ConsoleTransport'
import { LOG_LEVEL_NAMES, LogLevel } from '../types'
import type { LogLevelName, LoggerConfig } from '../types'

function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_NAMES, value)
}

/**
 * Resolve a level name such as "debug"; unknown names give undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const name = value?.trim().toLowerCase()
  return name && isLogLevelName(name) ? LOG_LEVEL_NAMES[name] : undefined
}

function readEnvironment(env: NodeJS.ProcessEnv): LoggerConfig['environment'] {
  switch (env.NODE_ENV) {
    case 'production':
      return 'production'
    case 'test':
      return 'test'
    default:
      return 'development'
  }
}

export function defaultLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: parseLogLevel(env.TIMESHEET_LOG_LEVEL) ?? LogLevel.WARN,
    ringBufferSize: 500,
    environment: readEnvironment(env),
  }
}

export class NodeLogger extends Logger {
  private static instance: NodeLogger | undefined

  private constructor(config: LoggerConfig) {
    super(config)
  }

  static getInstance(config?: LoggerConfig): NodeLogger {
    if (!NodeLogger.instance) {
      const instance = new NodeLogger(config ?? defaultLoggerConfig())
      instance.addTransport(new ConsoleTransport({
        enabled: instance.config.environment !== 'test',
        minLevel: instance.config.level,
        stderrOnly: true,
        colors: Boolean(process.stderr.isTTY),
      }))
      NodeLogger.instance = instance
    }

    return NodeLogger.instance
  }

  /**
   * Drop the singleton so the next getInstance builds a fresh logger
   */
  static resetInstance(): void {
    NodeLogger.instance?.shutdown()
    NodeLogger.instance = undefined
  }

  protected spawn(): Logger {
    return new NodeLogger(this.config)
  }
}

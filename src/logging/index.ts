/**
 * Unified logging system export
 */

// Types
export * from './types'

// Core
export { Logger } from './core/Logger'
export { RingBuffer } from './core/RingBuffer'
export { StructuredLogger } from './core/StructuredLogger'

// Node
export { NodeLogger, parseLogLevel, defaultLoggerConfig } from './node/NodeLogger'

// Transports
export { ConsoleTransport } from './transports/ConsoleTransport'
export type { ConsoleTransportOptions } from './transports/ConsoleTransport'

import { NodeLogger } from './node/NodeLogger'
import type { LoggerConfig } from './types'

export function createLogger(config?: LoggerConfig): NodeLogger {
  return NodeLogger.getInstance(config)
}


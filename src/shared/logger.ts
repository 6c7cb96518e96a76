// Scoped loggers for shared code, routed through the structured logging system

import { createLogger } from '../logging'

const createScopedLogger = (scope: string) => createLogger().child({ module: scope })

export const logger = {
  // Week and day calculations
  get engine() { return createScopedLogger('engine') },

  // Settings loading
  get config() { return createScopedLogger('config') },

  // Command-line front end
  get cli() { return createScopedLogger('cli') },
}

export default logger

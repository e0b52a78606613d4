/**
 * Application logger.
 *
 * Pino's browser build logs plain objects to the console. Modules take a
 * child logger so every line carries its origin:
 *
 *   const log = logger.child({ module: 'navigation' })
 *   log.debug({ key }, 'Entry created')
 */

import pino from 'pino'
import { config } from './config'

export const logger = pino({
  level: config.logLevel,
  base: { app: 'nav-handoff-demos' },
  browser: {
    asObject: true,
  },
})

/**
 * Logger shared by every registry and dispatcher created without a `logger` option.
 *
 * Those instances look the logger up each time they log, so calling
 * {@link configureLogging} after they were created still redirects them.
 */

import type { Logger } from './types.js'

// Duplicate registrations are routine; only failures reach the console.
const consoleLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
}

export let logger: Logger = consoleLogger

/**
 * Route hookpoint's failure reports and debug lines to `customLogger`.
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import { configureLogging } from 'hookpoint'
 *
 * configureLogging(pino({ level: 'debug' }).child({ component: 'hooks' }))
 * ```
 */
export function configureLogging(customLogger: Logger): void {
  logger = customLogger
}

/**
 * Go back to the console logger. Tests that call {@link configureLogging} undo it with this.
 */
export function resetLogging(): void {
  logger = consoleLogger
}

/**
 * Logging module exports.
 *
 * A single injectable logger shared by every registry and dispatcher that is not
 * given one explicitly.
 */

export { configureLogging, resetLogging, logger } from './logger.js'
export type { Logger } from './types.js'

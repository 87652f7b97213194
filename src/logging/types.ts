/**
 * Sink for the two things hookpoint reports: implementation failures isolated
 * during dispatch (error level) and ignored duplicate registrations (debug level).
 * Nothing else is logged.
 *
 * pino, winston and `console` all satisfy this shape, so an application hands
 * over the logger it already has, either globally through {@link configureLogging}
 * or per dispatcher and registry through their `logger` option.
 */
export interface Logger {
  /**
   * Receives `hook=<name>, owner=<id> | duplicate registration ignored`.
   */
  debug(...args: unknown[]): void

  info(...args: unknown[]): void

  warn(...args: unknown[]): void

  /**
   * Receives `hook=<name>, owner=<id>, error=<message> | hook implementation failed`,
   * and the matching line when an `onImplementationFailure` handler throws.
   */
  error(...args: unknown[]): void
}

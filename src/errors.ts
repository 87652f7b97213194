/**
 * Error types for hookpoint.
 *
 * Only registration and aggregation failures ever reach the caller. Failures inside
 * a hook implementation are wrapped in {@link HookImplementationError} and handed to
 * the dispatcher's reporting channel instead of being thrown.
 */

/**
 * Base class for every error raised by this package.
 */
export class HookError extends Error {
  /**
   * Creates a new HookError.
   *
   * @param message - Error message
   * @param options - Standard error options, used to carry the underlying cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'HookError'
  }
}

/**
 * Thrown when a registration or dispatcher configuration is malformed, such as an
 * empty hook name, an empty owner id, or a callable that is not a function.
 */
export class InvalidRegistrationError extends HookError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidRegistrationError'
  }
}

/**
 * Describes one hook implementation that threw or rejected during dispatch.
 *
 * Never thrown by `invoke`; it is logged and passed to the configured
 * `onImplementationFailure` handler.
 */
export class HookImplementationError extends HookError {
  /**
   * Name of the hook being dispatched.
   */
  public readonly hookName: string

  /**
   * Owner of the implementation that failed.
   */
  public readonly ownerId: string

  /**
   * Creates a new HookImplementationError.
   *
   * @param hookName - Name of the hook being dispatched
   * @param ownerId - Owner of the failing implementation
   * @param cause - The error raised by the implementation
   */
  constructor(hookName: string, ownerId: string, cause: Error) {
    super(`Hook '${hookName}' implementation from '${ownerId}' failed: ${cause.message}`, { cause })
    this.name = 'HookImplementationError'
    this.hookName = hookName
    this.ownerId = ownerId
  }
}

/**
 * Thrown by `invokeAggregate` when the aggregator cannot fold the collected results.
 *
 * This points at caller misuse (an aggregator that does not fit the hook's result
 * type), so it is surfaced rather than isolated.
 */
export class HookAggregationError extends HookError {
  /**
   * Name of the hook whose results were being aggregated, when known.
   */
  public readonly hookName: string | undefined

  constructor(message: string, options?: ErrorOptions & { hookName?: string }) {
    super(message, options)
    this.name = 'HookAggregationError'
    this.hookName = options?.hookName
  }
}

/**
 * Thrown by a built-in aggregator when a result has a shape it cannot fold,
 * e.g. `sum` receiving a string.
 */
export class AggregatorInputError extends HookAggregationError {
  /**
   * Position of the offending result in the sequence.
   */
  public readonly index: number

  constructor(aggregator: string, index: number, value: unknown) {
    super(`${aggregator} cannot aggregate result at index ${index} of type ${describeType(value)}`)
    this.name = 'AggregatorInputError'
    this.index = index
  }
}

/**
 * Converts anything thrown into an Error instance.
 *
 * @param error - The thrown value
 * @returns The same value when it already is an Error, otherwise a new Error wrapping its string form
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

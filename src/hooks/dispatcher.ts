import { HookAggregationError, HookImplementationError, normalizeError } from '../errors.js'
import { logger as globalLogger } from '../logging/index.js'
import type { Logger } from '../logging/index.js'
import { HookModule } from './module.js'
import { HookRegistry } from './registry.js'
import { parseDispatcherOptions } from './validation.js'
import type {
  Aggregator,
  DefaultHooks,
  DispatcherConfig,
  HookArgs,
  HookMap,
  HookName,
  HookResult,
  ImplementationFailureHandler,
  Registration,
} from './types.js'

/**
 * Fans a hook call out to every registered implementation and collects the results.
 *
 * Dispatch is sequential and in registration order. An implementation that throws
 * is reported and skipped; the remaining implementations still run. Each call works
 * on a snapshot of the registrations taken when it starts, so implementations that
 * register more hooks while running do not change the in-flight call.
 *
 * @typeParam THooks - Hook map describing the names and signatures of the hooks
 *
 * @example
 * ```typescript
 * interface ShopHooks {
 *   'order.discount': (total: number) => number
 * }
 *
 * const dispatcher = new HookDispatcher<ShopHooks>()
 * dispatcher.registerHook('order.discount', (total) => total * 0.1, 'loyalty')
 * dispatcher.registerHook('order.discount', () => 5, 'coupons')
 *
 * dispatcher.invoke('order.discount', 100) // [10, 5]
 * dispatcher.invokeAggregate('order.discount', sum, 100) // 15
 * ```
 */
export class HookDispatcher<THooks extends HookMap<THooks> = DefaultHooks> {
  /**
   * The registry this dispatcher reads from.
   */
  readonly registry: HookRegistry<THooks>

  private readonly _logger: Logger | undefined
  private readonly _defaultOwnerId: string
  private readonly _onImplementationFailure: ImplementationFailureHandler | undefined

  /**
   * Creates a new HookDispatcher.
   *
   * @param config - Dispatcher configuration
   * @throws InvalidRegistrationError if `defaultOwnerId` or `onImplementationFailure` is malformed
   */
  constructor(config: DispatcherConfig<THooks> = {}) {
    const options = parseDispatcherOptions({
      defaultOwnerId: config.defaultOwnerId,
      onImplementationFailure: config.onImplementationFailure,
    })

    this.registry = config.registry ?? new HookRegistry<THooks>({ logger: config.logger })
    this._logger = config.logger
    this._defaultOwnerId = options.defaultOwnerId
    this._onImplementationFailure = options.onImplementationFailure
  }

  /**
   * Call every implementation of a hook and collect what they return.
   *
   * @param hookName - Name of the hook
   * @param args - Arguments passed to every implementation
   * A promise returned by an async implementation is kept in the results as is; if it
   * rejects, the rejection is reported the same way as a synchronous throw.
   *
   * @returns Results of the implementations that did not throw, in registration order.
   * Empty when the hook has no implementations.
   */
  invoke<K extends HookName<THooks>>(hookName: K, ...args: HookArgs<THooks, K>): HookResult<THooks, K>[] {
    const results: HookResult<THooks, K>[] = []
    for (const { ownerId, callable } of this.registry.getHooks(hookName)) {
      try {
        results.push(this._watch(hookName, ownerId, callable(...args)))
      } catch (error) {
        this._reportFailure(hookName, ownerId, error)
      }
    }
    return results
  }

  /**
   * Call every implementation and key the results by owner.
   * When one owner registered several implementations, its last successful result is kept.
   *
   * @param hookName - Name of the hook
   * @param args - Arguments passed to every implementation
   * @returns Map from owner id to result, in the order owners first produced a result
   */
  invokeByOwner<K extends HookName<THooks>>(
    hookName: K,
    ...args: HookArgs<THooks, K>
  ): Map<string, HookResult<THooks, K>> {
    const results = new Map<string, HookResult<THooks, K>>()
    for (const { ownerId, callable } of this.registry.getHooks(hookName)) {
      try {
        results.set(ownerId, this._watch(hookName, ownerId, callable(...args)))
      } catch (error) {
        this._reportFailure(hookName, ownerId, error)
      }
    }
    return results
  }

  /**
   * Call every implementation and fold the results with an aggregator.
   *
   * @param hookName - Name of the hook
   * @param aggregator - Fold applied to the ordered results, see `aggregators`
   * @param args - Arguments passed to every implementation
   * @returns Whatever the aggregator returns
   * @throws HookAggregationError if the aggregator fails
   */
  invokeAggregate<K extends HookName<THooks>, TOut>(
    hookName: K,
    aggregator: Aggregator<HookResult<THooks, K>, TOut>,
    ...args: HookArgs<THooks, K>
  ): TOut {
    return this._aggregate(hookName, aggregator, this.invoke(hookName, ...args))
  }

  /**
   * Call every implementation, awaiting each one before starting the next.
   * Synchronous throws and rejected promises are isolated the same way as in {@link invoke}.
   *
   * @param hookName - Name of the hook
   * @param args - Arguments passed to every implementation
   * @returns Settled results of the implementations that succeeded, in registration order
   */
  async invokeAsync<K extends HookName<THooks>>(
    hookName: K,
    ...args: HookArgs<THooks, K>
  ): Promise<Awaited<HookResult<THooks, K>>[]> {
    const registrations = this.registry.getHooks(hookName)
    const results: Awaited<HookResult<THooks, K>>[] = []
    for (const { ownerId, callable } of registrations) {
      try {
        results.push(await callable(...args))
      } catch (error) {
        this._reportFailure(hookName, ownerId, error)
      }
    }
    return results
  }

  /**
   * Async counterpart of {@link invokeAggregate}: the aggregator receives the settled results.
   *
   * @throws HookAggregationError if the aggregator fails
   */
  async invokeAggregateAsync<K extends HookName<THooks>, TOut>(
    hookName: K,
    aggregator: Aggregator<Awaited<HookResult<THooks, K>>, TOut>,
    ...args: HookArgs<THooks, K>
  ): Promise<TOut> {
    const results = await this.invokeAsync(hookName, ...args)
    return this._aggregate(hookName, aggregator, results)
  }

  /**
   * Register an implementation through this dispatcher's registry.
   *
   * @param hookName - Name of the hook
   * @param callable - The implementation
   * @param ownerId - Registering component; the configured `defaultOwnerId` when omitted
   * @throws InvalidRegistrationError if any argument is malformed
   */
  registerHook<K extends HookName<THooks>>(hookName: K, callable: THooks[K], ownerId?: string): void {
    this.registry.register(hookName, callable, ownerId ?? this._defaultOwnerId)
  }

  /**
   * Implementations of a hook, for tooling and debugging.
   *
   * @param hookName - Name of the hook
   * @returns Registrations in registration order
   */
  getHookImplementations<K extends HookName<THooks>>(hookName: K): Registration<THooks[K]>[] {
    return this.registry.getHooks(hookName)
  }

  /**
   * Registration helper bound to one owner.
   *
   * @param ownerId - Identifier of the component that will register through the module
   * @throws InvalidRegistrationError if the owner id is empty
   */
  module(ownerId: string): HookModule<THooks> {
    return new HookModule(this.registry, ownerId)
  }

  private _aggregate<TIn, TOut>(hookName: string, aggregator: Aggregator<TIn, TOut>, results: TIn[]): TOut {
    try {
      return aggregator(results)
    } catch (error) {
      if (error instanceof HookAggregationError) {
        throw error
      }
      const cause = normalizeError(error)
      throw new HookAggregationError(`Aggregating results of hook '${hookName}' failed: ${cause.message}`, {
        cause,
        hookName,
      })
    }
  }

  private _watch<T>(hookName: string, ownerId: string, result: T): T {
    if (isPromiseLike(result)) {
      void Promise.resolve(result).catch((error: unknown) => this._reportFailure(hookName, ownerId, error))
    }
    return result
  }

  private _reportFailure(hookName: string, ownerId: string, error: unknown): void {
    const cause = normalizeError(error)
    const failure = new HookImplementationError(hookName, ownerId, cause)
    const logger = this._logger ?? globalLogger

    logger.error(`hook=<${hookName}>, owner=<${ownerId}>, error=<${cause.message}> | hook implementation failed`)

    if (this._onImplementationFailure === undefined) {
      return
    }
    try {
      this._onImplementationFailure(failure)
    } catch (handlerError) {
      logger.error(
        `hook=<${hookName}>, owner=<${ownerId}>, error=<${normalizeError(handlerError).message}> | implementation failure handler threw`
      )
    }
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
}

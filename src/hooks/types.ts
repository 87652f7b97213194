import type { HookRegistry } from './registry.js'
import type { HookImplementationError } from '../errors.js'
import type { Logger } from '../logging/types.js'

/**
 * Widest implementation signature a hook can have.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type HookFunction = (...args: any[]) => any

/**
 * Constraint for hook maps: every key is a hook name and every value an
 * implementation signature.
 *
 * @example
 * ```typescript
 * interface ShopHooks {
 *   'order.total': (order: Order) => number
 *   'order.tags': (order: Order) => string[]
 * }
 *
 * const dispatcher = new HookDispatcher<ShopHooks>()
 * dispatcher.invoke('order.total', order) // number[]
 * ```
 */
export type HookMap<T> = { [K in keyof T]: HookFunction }

/**
 * Hook map used when none is given: any hook name, any implementation.
 */
export interface DefaultHooks {
  [hookName: string]: HookFunction
}

/**
 * Hook names declared by a hook map.
 */
export type HookName<THooks> = Extract<keyof THooks, string>

/**
 * Argument tuple every implementation of `K` receives.
 */
export type HookArgs<THooks extends HookMap<THooks>, K extends HookName<THooks>> = Parameters<THooks[K]>

/**
 * Value a single implementation of `K` returns.
 */
export type HookResult<THooks extends HookMap<THooks>, K extends HookName<THooks>> = ReturnType<THooks[K]>

/**
 * One implementation registered against a hook.
 * Registrations are frozen; equality is owner id plus callable identity.
 */
export interface Registration<F extends HookFunction = HookFunction> {
  readonly ownerId: string
  readonly callable: F
}

/**
 * Folds the ordered per-implementation results of one dispatch into a single value.
 */
export type Aggregator<TIn, TOut> = (results: TIn[]) => TOut

/**
 * Receives every implementation failure a dispatcher isolates.
 */
export type ImplementationFailureHandler = (error: HookImplementationError) => void

/**
 * Protocol for components that register their hook implementations in one place.
 * This is the explicit replacement for registration decorators: the component's
 * initialisation code hands its provider to the registry.
 *
 * @example
 * ```typescript
 * class BillingHooks implements HookProvider<ShopHooks> {
 *   registerHooks(registry: HookRegistry<ShopHooks>): void {
 *     registry.register('order.total', this.total, 'billing')
 *   }
 *
 *   private total = (order: Order): number => order.lines.length * 10
 * }
 * ```
 */
export interface HookProvider<THooks extends HookMap<THooks> = DefaultHooks> {
  /**
   * Register this component's implementations.
   *
   * @param registry - The registry to register with
   */
  registerHooks(registry: HookRegistry<THooks>): void
}

/**
 * Configuration for {@link HookRegistry}.
 */
export interface RegistryConfig {
  /**
   * Logger for ignored duplicate registrations. Falls back to the global logger at call time.
   */
  logger?: Logger
}

/**
 * Configuration for {@link HookDispatcher}.
 */
export interface DispatcherConfig<THooks extends HookMap<THooks> = DefaultHooks> {
  /**
   * Registry to dispatch from. A new empty registry is created when omitted,
   * sharing this dispatcher's `logger`. A registry passed in keeps its own logger.
   */
  registry?: HookRegistry<THooks>

  /**
   * Logger for failure reports, and for duplicate registrations in the registry the
   * dispatcher creates. Falls back to the global logger at call time.
   */
  logger?: Logger

  /**
   * Owner id used by `registerHook` when the caller does not pass one.
   * Defaults to `'default'`.
   */
  defaultOwnerId?: string

  /**
   * Called with each isolated implementation failure, after it is logged.
   */
  onImplementationFailure?: ImplementationFailureHandler
}

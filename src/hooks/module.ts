import { validateOwnerId } from './validation.js'
import type { HookRegistry } from './registry.js'
import type { DefaultHooks, HookMap, HookName } from './types.js'

/**
 * Registration helper bound to a single owner.
 *
 * Stands in for registration decorators: a component creates one module with its
 * own id and registers each implementation where it is defined. The callable is
 * returned unchanged so it stays usable on its own.
 *
 * @example
 * ```typescript
 * const billing = dispatcher.module('billing')
 *
 * export const orderTotal = billing.hook('order.total', (order: Order) => order.subtotal + order.tax)
 * ```
 */
export class HookModule<THooks extends HookMap<THooks> = DefaultHooks> {
  /**
   * Owner id attached to every registration made through this module.
   */
  readonly ownerId: string

  private readonly _registry: HookRegistry<THooks>

  /**
   * @param registry - Registry to register into
   * @param ownerId - Identifier of the owning component
   * @throws InvalidRegistrationError if the owner id is empty
   */
  constructor(registry: HookRegistry<THooks>, ownerId: string) {
    this._registry = registry
    this.ownerId = validateOwnerId(ownerId)
  }

  /**
   * Register `callable` under `hookName` and hand it back.
   *
   * @param hookName - Name of the hook
   * @param callable - The implementation
   * @returns The same callable
   */
  hook<K extends HookName<THooks>, F extends THooks[K]>(hookName: K, callable: F): F {
    this._registry.register(hookName, callable, this.ownerId)
    return callable
  }
}

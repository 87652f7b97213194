import { logger as globalLogger } from '../logging/index.js'
import type { Logger } from '../logging/index.js'
import { validateRegistration } from './validation.js'
import type { DefaultHooks, HookMap, HookName, HookProvider, Registration, RegistryConfig } from './types.js'

/**
 * Owns the table of hook implementations for one process or one test.
 *
 * Registrations are kept per hook name in insertion order. Registering the same
 * owner and callable twice under a name is a silent no-op, so components may
 * register defensively (for example when a module is evaluated twice).
 *
 * Lists are replaced rather than mutated on registration, so a list handed out
 * earlier never changes underneath a dispatch that is iterating it.
 *
 * @typeParam THooks - Hook map describing the names and signatures this registry accepts
 *
 * @example
 * ```typescript
 * const registry = new HookRegistry()
 * registry.register('greeting', (name: string) => `hello ${name}`, 'core')
 * registry.getHooks('greeting') // [{ ownerId: 'core', callable: [Function] }]
 * ```
 */
export class HookRegistry<THooks extends HookMap<THooks> = DefaultHooks> {
  private readonly _table: Map<string, readonly Registration[]>
  private readonly _logger: Logger | undefined

  /**
   * @param config - Registry configuration
   */
  constructor(config: RegistryConfig = {}) {
    this._table = new Map()
    this._logger = config.logger
  }

  /**
   * Register an implementation of a hook.
   *
   * @param hookName - Name of the hook
   * @param callable - The implementation
   * @param ownerId - Identifier of the registering component
   * @throws InvalidRegistrationError if any argument is malformed
   */
  register<K extends HookName<THooks>>(hookName: K, callable: THooks[K], ownerId: string): void {
    validateRegistration(hookName, callable, ownerId)

    const registrations = this._table.get(hookName) ?? []
    if (registrations.some((entry) => entry.ownerId === ownerId && entry.callable === callable)) {
      const logger = this._logger ?? globalLogger
      logger.debug(`hook=<${hookName}>, owner=<${ownerId}> | duplicate registration ignored`)
      return
    }

    const registration: Registration = Object.freeze({ ownerId, callable })
    this._table.set(hookName, [...registrations, registration])
  }

  /**
   * Register all implementations from a hook provider.
   *
   * @param provider - The hook provider to register
   */
  addProvider(provider: HookProvider<THooks>): void {
    provider.registerHooks(this)
  }

  /**
   * Register all implementations from multiple hook providers, in order.
   *
   * @param providers - Array of hook providers to register
   */
  addAllProviders(providers: HookProvider<THooks>[]): void {
    for (const provider of providers) {
      this.addProvider(provider)
    }
  }

  /**
   * Get the implementations of a hook in registration order.
   *
   * @param hookName - Name of the hook
   * @returns A copy of the registrations; empty when the hook is unknown
   */
  getHooks<K extends HookName<THooks>>(hookName: K): Registration<THooks[K]>[] {
    const registrations = this._table.get(hookName) ?? []
    // Entries under hookName were only ever stored by register<K>, so their callables are THooks[K]
    return [...registrations] as Registration<THooks[K]>[]
  }

  /**
   * Snapshot of the whole table, for introspection and debugging.
   *
   * @returns A new map holding copies of every registration list
   */
  getAll(): Map<string, Registration[]> {
    const snapshot = new Map<string, Registration[]>()
    for (const [hookName, registrations] of this._table) {
      snapshot.set(hookName, [...registrations])
    }
    return snapshot
  }

  /**
   * Whether at least one implementation is registered under the name.
   */
  has(hookName: string): boolean {
    return this._table.has(hookName)
  }

  /**
   * Names of all hooks with at least one implementation, in first-registration order.
   */
  hookNames(): string[] {
    return Array.from(this._table.keys())
  }

  /**
   * Remove every registration. Meant for test setup and teardown.
   */
  clear(): void {
    this._table.clear()
  }
}

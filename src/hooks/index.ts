/**
 * Hooks module: named extension points with fault-isolated dispatch.
 *
 * Components register implementations against a hook name; callers invoke the
 * name once and get every implementation's result, optionally folded by an
 * aggregator.
 */

// Registry and dispatch
export { HookRegistry } from './registry.js'
export { HookDispatcher } from './dispatcher.js'
export { HookModule } from './module.js'

// Aggregators
export { sum, flatten, mergeMap, firstNonEmpty, collectAll } from './aggregators.js'
export * as aggregators from './aggregators.js'

// Types
export type {
  Aggregator,
  DefaultHooks,
  DispatcherConfig,
  HookArgs,
  HookFunction,
  HookMap,
  HookName,
  HookProvider,
  HookResult,
  ImplementationFailureHandler,
  Registration,
  RegistryConfig,
} from './types.js'

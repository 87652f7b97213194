/**
 * Main entry point for hookpoint.
 *
 * Named extension points ("hooks") that independently loaded components implement
 * and that callers invoke once to collect every implementation's result.
 */

// Error types
export {
  HookError,
  InvalidRegistrationError,
  HookImplementationError,
  HookAggregationError,
  AggregatorInputError,
  normalizeError,
} from './errors.js'

// Hooks
export {
  HookRegistry,
  HookDispatcher,
  HookModule,
  sum,
  flatten,
  mergeMap,
  firstNonEmpty,
  collectAll,
  aggregators,
} from './hooks/index.js'

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
} from './hooks/index.js'

// Logging
export { configureLogging, resetLogging } from './logging/index.js'
export type { Logger } from './logging/index.js'

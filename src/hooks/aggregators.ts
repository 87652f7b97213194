/**
 * Built-in aggregators for `invokeAggregate`.
 *
 * Each one is a pure fold over the ordered results of a single dispatch. None of
 * them mutates its input, and all of them accept an empty sequence.
 */

import { AggregatorInputError } from '../errors.js'

/**
 * Arithmetic sum of numeric results. An empty sequence sums to 0.
 *
 * @throws AggregatorInputError if any result is not a number
 */
export function sum(results: unknown[]): number {
  let total = 0
  results.forEach((value, index) => {
    if (typeof value !== 'number') {
      throw new AggregatorInputError('sum', index, value)
    }
    total += value
  })
  return total
}

/**
 * Splices array results one level deep and appends everything else as-is.
 *
 * @example
 * ```typescript
 * flatten([[1, 2], [3, 4], 5]) // [1, 2, 3, 4, 5]
 * ```
 */
export function flatten<T>(results: (T | readonly T[])[]): T[] {
  const flattened: T[] = []
  for (const result of results) {
    if (isReadonlyArray(result)) {
      flattened.push(...result)
    } else {
      flattened.push(result)
    }
  }
  return flattened
}

/**
 * Merges plain-object results into a new object. On key collisions the later
 * result wins, so the last registered implementation takes precedence.
 * Results that are not plain objects (arrays, null, primitives, Maps, class
 * instances) are skipped.
 *
 * @example
 * ```typescript
 * mergeMap([{ a: 1 }, { b: 2 }, { a: 3, c: 4 }]) // { a: 3, b: 2, c: 4 }
 * ```
 */
export function mergeMap(results: unknown[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {}
  for (const result of results) {
    if (!isPlainObject(result)) {
      continue
    }
    // Defined rather than assigned, so an own '__proto__' key stays a key
    for (const [key, value] of Object.entries(result)) {
      Object.defineProperty(merged, key, { value, enumerable: true, writable: true, configurable: true })
    }
  }
  return merged
}

/**
 * First result that is present. Only `undefined` and `null` are skipped;
 * `false`, `0` and `''` count as present.
 *
 * @returns The first present result, or undefined when there is none
 */
export function firstNonEmpty<T>(results: (T | null | undefined)[]): T | undefined {
  for (const result of results) {
    if (result !== undefined && result !== null) {
      return result
    }
  }
  return undefined
}

/**
 * Identity aggregator: the results exactly as dispatched.
 */
export function collectAll<T>(results: T[]): T[] {
  return results
}

function isReadonlyArray<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value)
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

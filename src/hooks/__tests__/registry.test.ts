import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { HookRegistry } from '../registry.js'
import type { HookProvider } from '../types.js'
import { InvalidRegistrationError } from '../../errors.js'
import { configureLogging, resetLogging } from '../../logging/index.js'
import { MockHookProvider, type ShopHooks } from '../../__fixtures__/mock-hook-provider.js'
import { createMockLogger, loggedMessages } from '../../__fixtures__/mock-logger.js'

describe('HookRegistry', () => {
  let registry: HookRegistry

  beforeEach(() => {
    registry = new HookRegistry()
  })

  describe('register', () => {
    it('stores the owner and callable', () => {
      const callable = (): string => 'test_result'

      registry.register('test_hook', callable, 'test_app')

      const hooks = registry.getHooks('test_hook')
      expect(hooks).toHaveLength(1)
      expect(hooks[0]?.ownerId).toBe('test_app')
      expect(hooks[0]?.callable).toBe(callable)
    })

    it('ignores a duplicate owner and callable pair', () => {
      const callable = (): string => 'test_result'

      registry.register('test_hook', callable, 'test_app')
      registry.register('test_hook', callable, 'test_app')

      expect(registry.getHooks('test_hook')).toHaveLength(1)
    })

    it('logs duplicate registrations at debug level only', () => {
      const mockLogger = createMockLogger()
      configureLogging(mockLogger)
      const callable = (): string => 'test_result'

      registry.register('test_hook', callable, 'test_app')
      registry.register('test_hook', callable, 'test_app')

      expect(loggedMessages(mockLogger, 'debug')).toEqual([
        'hook=<test_hook>, owner=<test_app> | duplicate registration ignored',
      ])
      expect(mockLogger.error).not.toHaveBeenCalled()
      resetLogging()
    })

    it('logs duplicates to its own logger when given one', () => {
      const ownLogger = createMockLogger()
      const globalLogger = createMockLogger()
      configureLogging(globalLogger)
      const withLogger = new HookRegistry({ logger: ownLogger })
      const callable = (): string => 'test_result'

      withLogger.register('test_hook', callable, 'test_app')
      withLogger.register('test_hook', callable, 'test_app')

      expect(loggedMessages(ownLogger, 'debug')).toEqual([
        'hook=<test_hook>, owner=<test_app> | duplicate registration ignored',
      ])
      expect(globalLogger.debug).not.toHaveBeenCalled()
      resetLogging()
    })

    it('keeps the same callable registered by different owners', () => {
      const callable = (): string => 'shared'

      registry.register('test_hook', callable, 'app1')
      registry.register('test_hook', callable, 'app2')

      expect(registry.getHooks('test_hook').map((entry) => entry.ownerId)).toEqual(['app1', 'app2'])
    })

    it('treats distinct closures with identical bodies as different implementations', () => {
      const makeCallable = () => (): string => 'same'

      registry.register('test_hook', makeCallable(), 'test_app')
      registry.register('test_hook', makeCallable(), 'test_app')

      expect(registry.getHooks('test_hook')).toHaveLength(2)
    })

    it('keeps different callables in registration order', () => {
      const hook1 = (): string => 'a'
      const hook2 = (): string => 'b'

      registry.register('test_hook', hook1, 'app1')
      registry.register('test_hook', hook2, 'app2')

      expect(registry.getHooks('test_hook')).toEqual([
        { ownerId: 'app1', callable: hook1 },
        { ownerId: 'app2', callable: hook2 },
      ])
    })

    it('keeps the same callable under different hook names apart', () => {
      const callable = (): string => 'shared'

      registry.register('first_hook', callable, 'test_app')
      registry.register('second_hook', callable, 'test_app')

      expect(registry.getHooks('first_hook')).toHaveLength(1)
      expect(registry.getHooks('second_hook')).toHaveLength(1)
    })

    it('freezes registrations', () => {
      registry.register('test_hook', () => 'x', 'test_app')

      expect(Object.isFrozen(registry.getHooks('test_hook')[0])).toBe(true)
    })

    it('rejects an empty hook name', () => {
      expect(() => registry.register('', () => 'x', 'test_app')).toThrow(InvalidRegistrationError)
      expect(() => registry.register('', () => 'x', 'test_app')).toThrow('hook name must not be empty')
    })

    it('rejects an empty owner id', () => {
      expect(() => registry.register('test_hook', () => 'x', '')).toThrow('owner id must not be empty')
    })

    it('rejects a callable that is not a function', () => {
      const notCallable: unknown = 'not a function'

      expect(() => Reflect.apply(registry.register, registry, ['test_hook', notCallable, 'test_app'])).toThrow(
        'callable must be a function'
      )
      expect(registry.hookNames()).toEqual([])
    })
  })

  describe('getHooks', () => {
    it('returns an empty array for an unknown hook', () => {
      expect(registry.getHooks('nonexistent_hook')).toEqual([])
    })

    it('returns a copy that does not affect the registry when mutated', () => {
      registry.register('test_hook', () => 'x', 'test_app')

      const hooks = registry.getHooks('test_hook')
      hooks.pop()

      expect(registry.getHooks('test_hook')).toHaveLength(1)
    })

    it('does not change a previously returned list on later registrations', () => {
      registry.register('test_hook', () => 'a', 'app1')
      const before = registry.getHooks('test_hook')

      registry.register('test_hook', () => 'b', 'app2')

      expect(before).toHaveLength(1)
      expect(registry.getHooks('test_hook')).toHaveLength(2)
    })
  })

  describe('getAll', () => {
    it('returns every hook with its registrations', () => {
      const hook1 = (): string => 'a'
      const hook2 = (): string => 'b'
      registry.register('first_hook', hook1, 'app1')
      registry.register('second_hook', hook2, 'app2')

      const all = registry.getAll()

      expect(Array.from(all.keys())).toEqual(['first_hook', 'second_hook'])
      expect(all.get('first_hook')).toEqual([{ ownerId: 'app1', callable: hook1 }])
      expect(all.get('second_hook')).toEqual([{ ownerId: 'app2', callable: hook2 }])
    })

    it('returns a snapshot', () => {
      registry.register('test_hook', () => 'a', 'app1')

      const all = registry.getAll()
      all.get('test_hook')?.pop()
      all.delete('test_hook')

      expect(registry.getHooks('test_hook')).toHaveLength(1)
    })
  })

  describe('has and hookNames', () => {
    it('reports registered hook names in first-registration order', () => {
      registry.register('second', () => 2, 'app')
      registry.register('first', () => 1, 'app')
      registry.register('second', () => 3, 'app')

      expect(registry.hookNames()).toEqual(['second', 'first'])
      expect(registry.has('first')).toBe(true)
      expect(registry.has('third')).toBe(false)
    })
  })

  describe('clear', () => {
    it('removes every registration', () => {
      registry.register('test_hook', () => 'test_result', 'test_app')
      registry.register('other_hook', () => 'other', 'test_app')

      registry.clear()

      expect(registry.getHooks('test_hook')).toEqual([])
      expect(registry.getHooks('other_hook')).toEqual([])
      expect(registry.getAll().size).toBe(0)
    })
  })

  describe('providers', () => {
    let shopRegistry: HookRegistry<ShopHooks>

    beforeEach(() => {
      shopRegistry = new HookRegistry<ShopHooks>()
    })

    afterEach(() => {
      resetLogging()
    })

    it('registers all implementations from a provider', () => {
      shopRegistry.addProvider(new MockHookProvider('billing'))

      expect(shopRegistry.hookNames()).toEqual(['order.total', 'order.tags', 'order.labels', 'order.note'])
      expect(shopRegistry.getHooks('order.total')[0]?.ownerId).toBe('billing')
    })

    it('registers providers in the order given', () => {
      shopRegistry.addAllProviders([new MockHookProvider('first'), new MockHookProvider('second')])

      expect(shopRegistry.getHooks('order.total').map((entry) => entry.ownerId)).toEqual(['first', 'second'])
    })

    it('accepts plain object providers', () => {
      const total = (subtotal: number): number => subtotal
      const provider: HookProvider<ShopHooks> = {
        registerHooks: (target) => target.register('order.total', total, 'inline'),
      }

      shopRegistry.addProvider(provider)
      shopRegistry.addProvider(provider)

      expect(shopRegistry.getHooks('order.total')).toEqual([{ ownerId: 'inline', callable: total }])
    })
  })
})

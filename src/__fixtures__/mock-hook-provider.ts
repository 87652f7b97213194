import type { HookProvider } from '../hooks/index.js'
import type { HookRegistry } from '../hooks/registry.js'

/**
 * Hook map shared by the dispatcher and provider tests.
 */
export interface ShopHooks {
  'order.total': (subtotal: number) => number
  'order.tags': (subtotal: number) => string[] | string
  'order.labels': () => Record<string, string>
  'order.note': () => string | null | undefined
}

/**
 * Mock hook provider that registers one implementation per shop hook and
 * records every call made to them.
 */
export class MockHookProvider implements HookProvider<ShopHooks> {
  calls: string[] = []
  readonly ownerId: string

  constructor(ownerId = 'mock-provider') {
    this.ownerId = ownerId
  }

  registerHooks(registry: HookRegistry<ShopHooks>): void {
    registry.register('order.total', this.total, this.ownerId)
    registry.register('order.tags', this.tags, this.ownerId)
    registry.register('order.labels', this.labels, this.ownerId)
    registry.register('order.note', this.note, this.ownerId)
  }

  reset(): void {
    this.calls = []
  }

  private total = (subtotal: number): number => {
    this.calls.push('order.total')
    return subtotal * 2
  }

  private tags = (subtotal: number): string[] => {
    this.calls.push('order.tags')
    return subtotal > 100 ? ['large'] : ['small']
  }

  private labels = (): Record<string, string> => {
    this.calls.push('order.labels')
    return { source: this.ownerId }
  }

  private note = (): string => {
    this.calls.push('order.note')
    return `note from ${this.ownerId}`
  }
}

import { vi, type Mock } from 'vitest'
import type { Logger } from '../logging/index.js'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger whose methods are spies.
 */
export interface MockLogger extends Logger {
  debug: Mock
  info: Mock
  warn: Mock
  error: Mock
}

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

/**
 * First argument of every call made at `level`, as strings.
 */
export function loggedMessages(logger: MockLogger, level: LogLevel): string[] {
  return logger[level].mock.calls.map((call) => String(call[0]))
}

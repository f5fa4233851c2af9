/**
 * Global Test Setup
 *
 * @module setup
 */

import { vi, beforeEach, beforeAll, afterAll } from 'vitest'

// Reset mocks between tests
beforeEach(() => {
  vi.clearAllMocks()
})

// Keep component logs (`[ThemeResolver] ...` etc.) out of the test output.
// Spies installed by individual tests still see every call.
const COMPONENT_LOG = /^\[(ThemeResolver|ThemeLoader|ConfigStore|ReloadWatcher|ServiceConfig)\]/

const originalConsole = {
  info: console.info,
  warn: console.warn,
  error: console.error,
}

function quiet(original: (...args: unknown[]) => void) {
  return (...args: unknown[]) => {
    const message = args[0]
    if (typeof message === 'string' && COMPONENT_LOG.test(message)) {
      return
    }
    original.apply(console, args)
  }
}

beforeAll(() => {
  console.info = quiet(originalConsole.info)
  console.warn = quiet(originalConsole.warn)
  console.error = quiet(originalConsole.error)
})

afterAll(() => {
  console.info = originalConsole.info
  console.warn = originalConsole.warn
  console.error = originalConsole.error
})

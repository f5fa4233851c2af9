/**
 * Service Configuration Tests
 *
 * @module config.test
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { DEFAULT_SERVICE_CONFIG, parseEnvOverrides, resolveServiceConfig } from '..'

describe('parseEnvOverrides', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should return nothing for an empty environment', () => {
    expect(parseEnvOverrides({})).toEqual({})
  })

  it('should read every supported variable', () => {
    const overrides = parseEnvOverrides({
      THEME_GLOBAL_SOURCE: '/games/settings.yaml',
      THEME_WATCH: 'true',
      THEME_WATCH_POLLING: '1',
      THEME_WATCH_DEBOUNCE_MS: '50',
      THEME_LOG_DIAGNOSTICS: 'false',
    })

    expect(overrides).toEqual({
      globalSourcePath: '/games/settings.yaml',
      watch: { enabled: true, usePolling: true, debounceMs: 50 },
      diagnostics: { logToConsole: false },
    })
  })

  it('should treat anything but true or 1 as false', () => {
    expect(parseEnvOverrides({ THEME_WATCH: 'yes' })).toEqual({ watch: { enabled: false } })
    expect(parseEnvOverrides({ THEME_WATCH: 'TRUE' })).toEqual({ watch: { enabled: true } })
  })

  it('should ignore an invalid debounce period', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    expect(parseEnvOverrides({ THEME_WATCH_DEBOUNCE_MS: 'soon' })).toEqual({})
    expect(parseEnvOverrides({ THEME_WATCH_DEBOUNCE_MS: '-5' })).toEqual({})
    expect(warn).toHaveBeenCalledWith('[ServiceConfig] Ignoring THEME_WATCH_DEBOUNCE_MS=soon')
  })
})

describe('resolveServiceConfig', () => {
  it('should return the defaults with no overrides', () => {
    expect(resolveServiceConfig({}, {})).toEqual(DEFAULT_SERVICE_CONFIG)
  })

  it('should merge partial overrides over the defaults', () => {
    const config = resolveServiceConfig({ watch: { usePolling: true } }, {})

    expect(config.watch).toEqual({ ...DEFAULT_SERVICE_CONFIG.watch, usePolling: true })
    expect(config.globalSourcePath).toBe('settings.yaml')
  })

  it('should let environment variables win over overrides', () => {
    const config = resolveServiceConfig(
      { globalSourcePath: 'custom.yaml', watch: { enabled: true, debounceMs: 10 } },
      { THEME_GLOBAL_SOURCE: 'env.yaml', THEME_WATCH: '0' }
    )

    expect(config.globalSourcePath).toBe('env.yaml')
    expect(config.watch.enabled).toBe(false)
    expect(config.watch.debounceMs).toBe(10)
  })

  it('should not mutate the defaults', () => {
    resolveServiceConfig({ watch: { enabled: false } }, {})

    expect(DEFAULT_SERVICE_CONFIG.watch.enabled).toBe(true)
  })
})

/**
 * Service Configuration Resolver
 *
 * Merges the service settings from defaults, caller overrides and
 * environment variables, in that order.
 */

import {
  DEFAULT_SERVICE_CONFIG,
  type ThemeServiceConfig,
  type ThemeServiceConfigOverrides,
} from './types'

type Env = Record<string, string | undefined>

function parseBoolean(value: string): boolean {
  const normalized = value.toLowerCase()
  return normalized === 'true' || normalized === '1'
}

function parseMilliseconds(value: string): number | undefined {
  const parsed = parseInt(value, 10)
  return isNaN(parsed) || parsed < 0 ? undefined : parsed
}

// ============================================================================
// ENVIRONMENT VARIABLE PARSING
// ============================================================================

export function parseEnvOverrides(env: Env = process.env): ThemeServiceConfigOverrides {
  const overrides: ThemeServiceConfigOverrides = {}

  // THEME_GLOBAL_SOURCE
  if (env.THEME_GLOBAL_SOURCE) {
    overrides.globalSourcePath = env.THEME_GLOBAL_SOURCE
  }

  // THEME_WATCH
  if (env.THEME_WATCH !== undefined) {
    overrides.watch = { enabled: parseBoolean(env.THEME_WATCH) }
  }

  // THEME_WATCH_POLLING
  if (env.THEME_WATCH_POLLING !== undefined) {
    overrides.watch = { ...overrides.watch, usePolling: parseBoolean(env.THEME_WATCH_POLLING) }
  }

  // THEME_WATCH_DEBOUNCE_MS
  if (env.THEME_WATCH_DEBOUNCE_MS) {
    const debounceMs = parseMilliseconds(env.THEME_WATCH_DEBOUNCE_MS)
    if (debounceMs !== undefined) {
      overrides.watch = { ...overrides.watch, debounceMs }
    } else {
      console.warn(
        `[ServiceConfig] Ignoring THEME_WATCH_DEBOUNCE_MS=${env.THEME_WATCH_DEBOUNCE_MS}`
      )
    }
  }

  // THEME_LOG_DIAGNOSTICS
  if (env.THEME_LOG_DIAGNOSTICS !== undefined) {
    overrides.diagnostics = { logToConsole: parseBoolean(env.THEME_LOG_DIAGNOSTICS) }
  }

  return overrides
}

// ============================================================================
// MERGE
// ============================================================================

function applyOverrides(
  config: ThemeServiceConfig,
  overrides: ThemeServiceConfigOverrides
): ThemeServiceConfig {
  return {
    globalSourcePath: overrides.globalSourcePath ?? config.globalSourcePath,
    watch: { ...config.watch, ...overrides.watch },
    diagnostics: { ...config.diagnostics, ...overrides.diagnostics },
  }
}

/**
 * Resolve the effective service configuration
 */
export function resolveServiceConfig(
  overrides: ThemeServiceConfigOverrides = {},
  env: Env = process.env
): ThemeServiceConfig {
  const withOverrides = applyOverrides(DEFAULT_SERVICE_CONFIG, overrides)
  return applyOverrides(withOverrides, parseEnvOverrides(env))
}

/**
 * Service Configuration Types
 *
 * Settings for the theme service itself (where the sources live and how
 * they are watched). Resolved from built-in defaults, then explicit
 * overrides, then environment variables.
 */

export interface WatchConfig {
  /** Reload sources when they change on disk */
  enabled: boolean
  /** Poll instead of relying on native file events */
  usePolling: boolean
  /** Poll interval in ms */
  pollInterval: number
  /** Quiet period before a change is reloaded, in ms */
  debounceMs: number
  /** How long a file must stay unchanged before it counts as written, in ms */
  stabilityThreshold: number
}

export interface DiagnosticsConfig {
  /** Write resolver diagnostics to the console */
  logToConsole: boolean
}

export interface ThemeServiceConfig {
  /** Global settings document holding the `ui_theme` block */
  globalSourcePath: string
  watch: WatchConfig
  diagnostics: DiagnosticsConfig
}

export type ThemeServiceConfigOverrides = {
  globalSourcePath?: string
  watch?: Partial<WatchConfig>
  diagnostics?: Partial<DiagnosticsConfig>
}

export const DEFAULT_SERVICE_CONFIG: ThemeServiceConfig = {
  globalSourcePath: 'settings.yaml',
  watch: {
    enabled: true,
    usePolling: false,
    pollInterval: 1000,
    debounceMs: 200,
    stabilityThreshold: 300,
  },
  diagnostics: {
    logToConsole: true,
  },
}

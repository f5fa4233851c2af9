/**
 * UI Theme Resolution
 *
 * Priority (highest to lowest):
 * 1. Level overrides - `ui_theme` block of the active level
 * 2. Global settings - `ui_theme` block of settings.yaml
 * 3. Default table - built in
 * 4. Universal fallback - opaque white for colors, 0 for layout
 */

// Types
export * from './types'

// Default table
export { DEFAULT_THEME, DEFAULT_THEME_KEYS, listThemeKeys } from './defaults'

// Tree building and loading
export { buildConfigTree, ColorValueSchema, LayoutValueSchema, type TreeBuild } from './tree'
export { parseThemeDocument, loadThemeSource, type ThemeSourceReader } from './loader'

// Store, resolver, watcher
export { ConfigStore, type TreeResult, type ThemeSnapshot, type SwapEvent } from './store'
export { ThemeResolver, type ThemeResolverOptions } from './resolver'
export {
  ReloadWatcher,
  type ReloadWatcherOptions,
  type ReloadedEvent,
  type ReloadFailedEvent,
} from './watcher'

// Service
export { ThemeService, createThemeService, type ThemeServiceOptions } from './service'

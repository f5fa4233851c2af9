/**
 * Theme Service
 *
 * Composition root: one store, one resolver and one watcher, created once at
 * startup and handed by reference to the render loop and level transitions.
 */

import {
  resolveServiceConfig,
  type ThemeServiceConfig,
  type ThemeServiceConfigOverrides,
} from '../config'
import { loadThemeSource, type ThemeSourceReader } from './loader'
import { ThemeResolver } from './resolver'
import { ConfigStore } from './store'
import type { ConfigTree } from './types'
import { ReloadWatcher } from './watcher'

export interface ThemeServiceOptions {
  read?: ThemeSourceReader
  defaults?: ConfigTree
}

export class ThemeService {
  readonly config: ThemeServiceConfig
  readonly store: ConfigStore
  readonly resolver: ThemeResolver
  readonly watcher: ReloadWatcher | null
  private readonly read: ThemeSourceReader
  private levelRequest = 0

  constructor(config: ThemeServiceConfig, options: ThemeServiceOptions = {}) {
    this.config = config
    this.read = options.read ?? loadThemeSource
    this.store = new ConfigStore()
    this.resolver = new ThemeResolver(this.store, {
      defaults: options.defaults,
      logDiagnostics: config.diagnostics.logToConsole,
    })
    this.watcher = config.watch.enabled
      ? new ReloadWatcher(this.store, {
          globalPath: config.globalSourcePath,
          read: this.read,
          debounceMs: config.watch.debounceMs,
          usePolling: config.watch.usePolling,
          pollInterval: config.watch.pollInterval,
          stabilityThreshold: config.watch.stabilityThreshold,
        })
      : null
  }

  /**
   * Load the global source and start watching. A source that cannot be read
   * leaves the defaults in charge.
   */
  async start(): Promise<void> {
    const result = await this.read(this.config.globalSourcePath)
    this.store.loadGlobal(result)
    this.watcher?.start()
  }

  /**
   * Apply the `ui_theme` overrides of the level document at `path`
   */
  async enterLevel(path: string | null): Promise<void> {
    const request = ++this.levelRequest
    if (path === null) {
      this.exitLevel()
      return
    }

    const result = await this.read(path)
    if (request !== this.levelRequest) {
      return
    }
    this.store.setLevel(result)
    this.watcher?.watchLevel(path)
  }

  exitLevel(): void {
    this.levelRequest++
    this.store.clearLevel()
    this.watcher?.watchLevel(null)
  }

  async stop(): Promise<void> {
    await this.watcher?.stop()
  }
}

export function createThemeService(
  overrides: ThemeServiceConfigOverrides = {},
  options: ThemeServiceOptions = {}
): ThemeService {
  return new ThemeService(resolveServiceConfig(overrides), options)
}

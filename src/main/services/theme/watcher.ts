/**
 * ReloadWatcher
 *
 * Watches the global theme source and the active level's source, and swaps
 * the corresponding ConfigStore snapshot when one of them changes.
 * Features:
 * - File system watching with chokidar
 * - Debounced reloads per tier for rapid successive writes
 * - Explicit reload trigger for callers with their own change signal
 * - Failed reads keep the previous snapshot
 */

import { watch, type FSWatcher } from 'chokidar'
import { resolve } from 'path'
import { EventEmitter } from 'events'
import type { AppError } from '../../../shared/errors'
import type { ConfigStore } from './store'
import { loadThemeSource, type ThemeSourceReader } from './loader'
import type { SnapshotTier } from './types'

export interface ReloadWatcherOptions {
  /** Global settings document */
  globalPath: string
  /** Source reader, `loadThemeSource` unless replaced */
  read?: ThemeSourceReader
  /** Quiet period before a change is reloaded */
  debounceMs?: number
  /** Poll instead of relying on native file events */
  usePolling?: boolean
  pollInterval?: number
  /** How long a file size must stay unchanged before it counts as written */
  stabilityThreshold?: number
}

export interface ReloadedEvent {
  tier: SnapshotTier
  path: string
}

export interface ReloadFailedEvent extends ReloadedEvent {
  error: AppError
}

export class ReloadWatcher extends EventEmitter {
  private readonly store: ConfigStore
  private readonly globalPath: string
  private readonly read: ThemeSourceReader
  private readonly debounceMs: number
  private readonly usePolling: boolean
  private readonly pollInterval: number
  private readonly stabilityThreshold: number
  private watcher: FSWatcher | null = null
  private levelPath: string | null = null
  private debounceTimers: Map<SnapshotTier, NodeJS.Timeout> = new Map()
  // Latest read per tier; older reads that finish later are dropped
  private requests: Record<SnapshotTier, number> = { global: 0, level: 0 }

  constructor(store: ConfigStore, options: ReloadWatcherOptions) {
    super()
    this.store = store
    this.globalPath = resolve(options.globalPath)
    this.read = options.read ?? loadThemeSource
    this.debounceMs = options.debounceMs ?? 200
    this.usePolling = options.usePolling ?? false
    this.pollInterval = options.pollInterval ?? 1000
    this.stabilityThreshold = options.stabilityThreshold ?? 300
  }

  /**
   * Start watching the global source (and the level source, if one is set)
   */
  start(): void {
    if (this.watcher) {
      return
    }

    const paths = this.levelPath ? [this.globalPath, this.levelPath] : [this.globalPath]
    this.watcher = watch(paths, {
      persistent: true,
      ignoreInitial: true,
      usePolling: this.usePolling,
      interval: this.pollInterval,
      awaitWriteFinish: {
        stabilityThreshold: this.stabilityThreshold,
        pollInterval: 100,
      },
    })

    this.watcher.on('add', (path) => this.onFileChanged(path))
    this.watcher.on('change', (path) => this.onFileChanged(path))
    this.watcher.on('error', (error) => this.onWatchError(error))

    console.info(`[ReloadWatcher] Watching ${paths.join(', ')}`)
  }

  /**
   * Stop watching and drop pending reloads
   */
  async stop(): Promise<void> {
    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer)
    }
    this.debounceTimers.clear()

    if (this.watcher) {
      await this.watcher.close()
      this.watcher = null
      console.info('[ReloadWatcher] Stopped')
    }
  }

  /**
   * Point the level tier at another source, or at none
   */
  watchLevel(path: string | null): void {
    const next = path ? resolve(path) : null
    if (next === this.levelPath) {
      return
    }

    const pending = this.debounceTimers.get('level')
    if (pending) {
      clearTimeout(pending)
      this.debounceTimers.delete('level')
    }

    if (this.watcher) {
      if (this.levelPath && this.levelPath !== this.globalPath) {
        this.watcher.unwatch(this.levelPath)
      }
      if (next) {
        this.watcher.add(next)
      }
    }
    this.levelPath = next
  }

  /**
   * Reload a tier now. Resolves to true when a new snapshot was published;
   * a read overtaken by a newer one for the same tier is dropped.
   */
  async trigger(tier: SnapshotTier): Promise<boolean> {
    const path = tier === 'global' ? this.globalPath : this.levelPath
    if (!path) {
      return false
    }

    const request = ++this.requests[tier]
    const result = await this.read(path)

    // A newer read of this tier started, or the level changed meanwhile
    if (request !== this.requests[tier] || (tier === 'level' && this.levelPath !== path)) {
      return false
    }

    const applied =
      tier === 'global' ? this.store.reloadGlobal(result) : this.store.reloadLevel(result)

    if (!result.success) {
      const event: ReloadFailedEvent = { tier, path, error: result.error }
      this.emit('reload-failed', event)
      return false
    }

    const event: ReloadedEvent = { tier, path }
    console.info(`[ReloadWatcher] Reloaded ${tier} theme from ${path}`)
    this.emit('reloaded', event)
    return applied
  }

  getStatus(): { watching: boolean; globalPath: string; levelPath: string | null } {
    return {
      watching: this.watcher !== null,
      globalPath: this.globalPath,
      levelPath: this.levelPath,
    }
  }

  private onFileChanged(path: string): void {
    const changed = resolve(path)
    if (changed === this.globalPath) {
      this.schedule('global')
    }
    if (changed === this.levelPath) {
      this.schedule('level')
    }
  }

  private schedule(tier: SnapshotTier): void {
    const existing = this.debounceTimers.get(tier)
    if (existing) {
      clearTimeout(existing)
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(tier)
      this.trigger(tier).catch((error: unknown) => {
        console.error(`[ReloadWatcher] Reload of ${tier} theme failed:`, error)
      })
    }, this.debounceMs)
    this.debounceTimers.set(tier, timer)
  }

  private onWatchError(error: unknown): void {
    console.error('[ReloadWatcher] Watch error:', error)
  }
}

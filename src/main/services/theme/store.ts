/**
 * Config Store
 *
 * Holds the global and level theme snapshots. An update swaps one reference
 * to an already frozen tree and never merges, so a reader sees either the
 * old snapshot or the new one in full.
 *
 * @module services/theme/store
 */

import { EventEmitter } from 'events'
import { getErrorMessage, type Result } from '../../../shared/errors'
import { EMPTY_TREE, type ConfigTree, type SnapshotTier } from './types'

export type TreeResult = Result<ConfigTree>

export interface ThemeSnapshot {
  global: ConfigTree
  /** null when no level is active or the level has no overrides */
  level: ConfigTree | null
}

export type SwapReason = 'load' | 'set' | 'clear' | 'reload'

export interface SwapEvent {
  tier: SnapshotTier
  reason: SwapReason
  origin: string | null
}

export class ConfigStore extends EventEmitter {
  private current: Readonly<ThemeSnapshot> = Object.freeze({ global: EMPTY_TREE, level: null })

  /**
   * Install the initial global snapshot. A failed parse installs an empty
   * tree so lookups fall through to the defaults.
   */
  loadGlobal(source: TreeResult): void {
    if (source.success) {
      this.publish({ ...this.current, global: source.data }, 'global', 'load')
      return
    }
    console.error(
      `[ConfigStore] Global theme unavailable, using defaults: ${getErrorMessage(source.error)}`
    )
    this.publish({ ...this.current, global: EMPTY_TREE }, 'global', 'load')
  }

  /**
   * Replace the level snapshot. `null` means no level overrides; so does a
   * level source that failed to parse.
   */
  setLevel(source: TreeResult | null): void {
    if (source === null) {
      this.publish({ ...this.current, level: null }, 'level', 'clear')
      return
    }
    if (source.success) {
      this.publish({ ...this.current, level: source.data }, 'level', 'set')
      return
    }
    console.error(
      `[ConfigStore] Level theme unavailable, no overrides applied: ${getErrorMessage(source.error)}`
    )
    this.publish({ ...this.current, level: null }, 'level', 'set')
  }

  clearLevel(): void {
    this.setLevel(null)
  }

  /**
   * Swap in a re-read global tree. On failure the previous snapshot stays.
   */
  reloadGlobal(source: TreeResult): boolean {
    if (!source.success) {
      console.warn(
        `[ConfigStore] Global reload failed, keeping ${this.current.global.origin}: ${getErrorMessage(source.error)}`
      )
      return false
    }
    this.publish({ ...this.current, global: source.data }, 'global', 'reload')
    return true
  }

  /**
   * Swap in a re-read level tree (`null` drops the overrides). On failure the
   * previous snapshot stays.
   */
  reloadLevel(source: TreeResult | null): boolean {
    if (source === null) {
      this.publish({ ...this.current, level: null }, 'level', 'reload')
      return true
    }
    if (!source.success) {
      console.warn(
        `[ConfigStore] Level reload failed, keeping previous overrides: ${getErrorMessage(source.error)}`
      )
      return false
    }
    this.publish({ ...this.current, level: source.data }, 'level', 'reload')
    return true
  }

  /**
   * Current global and level trees as one consistent pair
   */
  snapshot(): Readonly<ThemeSnapshot> {
    return this.current
  }

  private publish(next: ThemeSnapshot, tier: SnapshotTier, reason: SwapReason): void {
    this.current = Object.freeze(next)
    const tree = tier === 'global' ? next.global : next.level
    const event: SwapEvent = { tier, reason, origin: tree ? tree.origin : null }
    this.emit('swap', event)
  }
}

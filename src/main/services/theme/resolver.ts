/**
 * Theme Resolver
 *
 * Tiered lookup of UI theme values:
 * 1. Level overrides (if a level is active)
 * 2. Global settings
 * 3. Default table
 * 4. Universal fallback (opaque white / 0) or the caller's default
 *
 * A tier holding an invalid value for a key counts as absent for that key.
 * Every call reads the store's current snapshot; nothing resolved is cached,
 * so a swap is visible to the very next call.
 */

import { EventEmitter } from 'events'
import { ValueShapeError } from '../../../shared/errors'
import type { ConfigStore } from './store'
import { DEFAULT_THEME, listThemeKeys } from './defaults'
import {
  UNIVERSAL_FALLBACK,
  lookupEntry,
  themePath,
  type ColorValue,
  type ConfigTree,
  type LayoutValue,
  type Resolution,
  type ThemeDiagnostic,
  type ThemeDiagnosticRecord,
  type ThemeEntry,
  type ThemeKey,
  type ThemeTier,
  type ThemeValue,
  type ValueKind,
} from './types'

type ValueEntry = Exclude<ThemeEntry, { kind: 'missing' }>

interface Found {
  entry: ValueEntry
  tier: ThemeTier
}

export interface ThemeResolverOptions {
  /** Table used below the global tier. Defaults to the built-in table. */
  defaults?: ConfigTree
  /** Write diagnostics to the console as well as emitting them */
  logDiagnostics?: boolean
}

export class ThemeResolver extends EventEmitter {
  private readonly store: ConfigStore
  private readonly defaults: ConfigTree
  private readonly defaultKeys: ThemeKey[]
  private readonly logDiagnostics: boolean
  // Diagnostics already reported for the current snapshots
  private reported = new Set<string>()

  constructor(store: ConfigStore, options: ThemeResolverOptions = {}) {
    super()
    this.store = store
    this.defaults = options.defaults ?? DEFAULT_THEME
    this.defaultKeys = listThemeKeys(this.defaults)
    this.logDiagnostics = options.logDiagnostics ?? true

    this.store.on('swap', () => this.reported.clear())
  }

  // ==========================================================================
  // CORE LOOKUP
  // ==========================================================================

  resolve(category: string, key: string, kind: 'color'): ColorValue
  resolve(category: string, key: string, kind: 'layout'): LayoutValue
  resolve(category: string, key: string, kind: ValueKind): ThemeValue
  resolve(category: string, key: string, kind: ValueKind): ThemeValue {
    const found = this.find(category, key, kind)
    return found ? found.entry.value : UNIVERSAL_FALLBACK[kind]
  }

  /**
   * Resolve a value and report which tier supplied it
   */
  explain(category: string, key: string, kind: 'color'): Resolution<'color'>
  explain(category: string, key: string, kind: 'layout'): Resolution<'layout'>
  explain(category: string, key: string, kind: ValueKind): Resolution
  explain(category: string, key: string, kind: ValueKind): Resolution {
    const found = this.find(category, key, kind)
    if (!found) {
      return { value: UNIVERSAL_FALLBACK[kind], tier: 'fallback' }
    }
    return { value: found.entry.value, tier: found.tier }
  }

  // ==========================================================================
  // ACCESSORS
  // ==========================================================================

  getColor(category: string, key: string): ColorValue {
    return this.resolve(category, key, 'color')
  }

  getBackgroundColor(page: string): ColorValue {
    return this.resolve('background', page, 'color')
  }

  getTextColor(role: string): ColorValue {
    return this.resolve('text', role, 'color')
  }

  /**
   * Layout lookup where `callerDefault` takes the place of the universal
   * fallback. Any configured value, including the default table's, wins over it.
   */
  getLayout(category: string, key: string, callerDefault: LayoutValue = 0): LayoutValue {
    const found = this.find(category, key, 'layout')
    if (found && found.entry.kind === 'layout') {
      return found.entry.value
    }
    return callerDefault
  }

  /**
   * Resolution of every key in the default table, with its source tier
   */
  getDiagnostics(): ThemeDiagnosticRecord[] {
    return this.defaultKeys.map(({ kind, category, key }) => {
      const rejectedBy: ThemeTier[] = []
      const found = this.find(category, key, kind, rejectedBy)
      return {
        kind,
        category,
        key,
        path: themePath(kind, category, key),
        value: found ? found.entry.value : UNIVERSAL_FALLBACK[kind],
        sourceTier: found ? found.tier : 'fallback',
        rejectedBy,
      }
    })
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private find(
    category: string,
    key: string,
    kind: ValueKind,
    rejectedBy?: ThemeTier[]
  ): Found | null {
    const { level, global } = this.store.snapshot()
    const tiers: Array<[ThemeTier, ConfigTree | null]> = [
      ['level', level],
      ['global', global],
      ['default', this.defaults],
    ]

    for (const [tier, tree] of tiers) {
      if (!tree) continue

      const entry = lookupEntry(tree, kind, category, key)
      if (!entry) continue

      if (entry.kind === 'missing') {
        rejectedBy?.push(tier)
        this.reportInvalid(tier, tree, kind, category, key, entry.reason, entry.raw)
        continue
      }
      // Only reachable through trees built by hand and handed to the store
      if (entry.kind !== kind) {
        rejectedBy?.push(tier)
        const reason = `expected ${kind}, found ${entry.kind}`
        this.reportInvalid(tier, tree, kind, category, key, reason, entry.value)
        continue
      }

      return { entry, tier }
    }

    if (!lookupEntry(this.defaults, kind, category, key)) {
      this.report(`missing-default:${themePath(kind, category, key)}`, {
        type: 'missing-default',
        path: themePath(kind, category, key),
      })
    }
    return null
  }

  private reportInvalid(
    tier: ThemeTier,
    tree: ConfigTree,
    kind: ValueKind,
    category: string,
    key: string,
    reason: string,
    raw: unknown
  ): void {
    const path = themePath(kind, category, key)
    const id = `invalid:${tier}:${path}`
    if (this.reported.has(id)) return

    const error = new ValueShapeError(`${path} in ${tree.origin}: ${reason}`, {
      path,
      value: raw,
      origin: tree.origin,
    })
    this.report(id, { type: 'invalid-value', tier, path, error })
  }

  private report(id: string, diagnostic: ThemeDiagnostic): void {
    if (this.reported.has(id)) return
    this.reported.add(id)

    if (this.logDiagnostics) {
      if (diagnostic.type === 'invalid-value') {
        console.warn(`[ThemeResolver] Ignoring ${diagnostic.tier} value: ${diagnostic.error.message}`)
      } else {
        console.warn(`[ThemeResolver] No default for ${diagnostic.path}, using universal fallback`)
      }
    }
    this.emit('diagnostic', diagnostic)
  }
}

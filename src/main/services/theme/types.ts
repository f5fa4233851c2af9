/**
 * Theme Types
 *
 * Data model for UI theme resolution.
 *
 * Tier order (highest to lowest):
 * 1. Level - `ui_theme` block of the active level
 * 2. Global - `ui_theme` block of the global settings document
 * 3. Default - compiled-in default table
 * 4. Fallback - caller default, or the universal fallback
 */

import type { ValueShapeError } from '../../../shared/errors'

// ============================================================================
// VALUES
// ============================================================================

/** RGB or RGBA, each channel an integer in [0, 255]. Absent alpha is opaque. */
export type ColorValue =
  | readonly [number, number, number]
  | readonly [number, number, number, number]

/** A number, or a nested mapping of numbers keyed by sub-property. */
export type LayoutValue = number | { readonly [key: string]: LayoutValue }

export type ValueKind = 'color' | 'layout'

export interface ThemeValueMap {
  color: ColorValue
  layout: LayoutValue
}

export type ThemeValue = ThemeValueMap[ValueKind]

/**
 * A leaf of a config tree. `missing` records a value that was present in the
 * source but failed validation for its section's kind.
 */
export type ThemeEntry =
  | { readonly kind: 'color'; readonly value: ColorValue }
  | { readonly kind: 'layout'; readonly value: LayoutValue }
  | {
      readonly kind: 'missing'
      readonly expected: ValueKind
      readonly reason: string
      readonly raw: unknown
    }

// ============================================================================
// TREES
// ============================================================================

export type TreeSection = ReadonlyMap<string, ReadonlyMap<string, ThemeEntry>>

export interface ConfigTree {
  /** Where the tree came from (file path, `defaults`, `empty`) */
  readonly origin: string
  readonly colors: TreeSection
  readonly layout: TreeSection
}

/** Document section name for each value kind */
export const SECTION_FOR_KIND: Record<ValueKind, 'colors' | 'layout'> = {
  color: 'colors',
  layout: 'layout',
}

export const EMPTY_TREE: ConfigTree = Object.freeze({
  origin: 'empty',
  colors: new Map(),
  layout: new Map(),
})

export function lookupEntry(
  tree: ConfigTree,
  kind: ValueKind,
  category: string,
  key: string
): ThemeEntry | undefined {
  return tree[SECTION_FOR_KIND[kind]].get(category)?.get(key)
}

export function themePath(kind: ValueKind, category: string, key: string): string {
  return `${SECTION_FOR_KIND[kind]}.${category}.${key}`
}

// ============================================================================
// TIERS
// ============================================================================

export type ThemeTier = 'level' | 'global' | 'default' | 'fallback'

/** Lookups that have a config tree behind them */
export type SnapshotTier = Exclude<ThemeTier, 'default' | 'fallback'>

export const UNIVERSAL_FALLBACK: ThemeValueMap = {
  color: [255, 255, 255],
  layout: 0,
}

// ============================================================================
// RESOLUTION RESULTS
// ============================================================================

export interface Resolution<K extends ValueKind = ValueKind> {
  value: ThemeValueMap[K]
  tier: ThemeTier
}

export interface ThemeKey {
  kind: ValueKind
  category: string
  key: string
}

export interface ThemeDiagnosticRecord extends ThemeKey {
  path: string
  value: ThemeValue
  sourceTier: ThemeTier
  /** Tiers above the source that held an invalid value for this key */
  rejectedBy: ThemeTier[]
}

export type ThemeDiagnostic =
  | {
      type: 'invalid-value'
      tier: ThemeTier
      path: string
      error: ValueShapeError
    }
  | {
      type: 'missing-default'
      path: string
    }

// ============================================================================
// COLOR HELPERS
// ============================================================================

/**
 * Expand a color to four channels; absent alpha becomes 255.
 */
export function toRgba(color: ColorValue): readonly [number, number, number, number] {
  const [r, g, b] = color
  return [r, g, b, color.length === 4 ? color[3] : 255]
}

/**
 * Default Theme Table
 *
 * Built-in values for every key the interface layer queries. Keep
 * default-theme.json in step with the accessors' callers: a key missing here
 * still resolves (to the universal fallback) but is reported as a diagnostic.
 */

import defaultThemeDocument from './default-theme.json'
import { buildConfigTree } from './tree'
import { SECTION_FOR_KIND, type ConfigTree, type ThemeKey, type ValueKind } from './types'

function buildDefaultTheme(): ConfigTree {
  const built = buildConfigTree(defaultThemeDocument, 'defaults')
  if (!built.success) {
    throw built.error
  }
  if (built.data.issues.length > 0) {
    throw new Error(`Invalid default theme entries: ${built.data.issues.join(', ')}`)
  }
  return built.data.tree
}

export const DEFAULT_THEME: ConfigTree = buildDefaultTheme()

export function listThemeKeys(tree: ConfigTree): ThemeKey[] {
  const keys: ThemeKey[] = []
  const kinds: ValueKind[] = ['color', 'layout']
  for (const kind of kinds) {
    for (const [category, entries] of tree[SECTION_FOR_KIND[kind]]) {
      for (const key of entries.keys()) {
        keys.push({ kind, category, key })
      }
    }
  }
  return keys
}

export const DEFAULT_THEME_KEYS: readonly ThemeKey[] = Object.freeze(listThemeKeys(DEFAULT_THEME))

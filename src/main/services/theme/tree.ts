/**
 * Config Tree Builder
 *
 * Turns a parsed `ui_theme` block into an immutable ConfigTree. Every leaf is
 * validated here, once, so the resolution chain only sees tagged values.
 */

import { z } from 'zod'
import { ThemeSourceError, ok, err, type Result } from '../../../shared/errors'
import type { ColorValue, ConfigTree, LayoutValue, ThemeEntry, TreeSection, ValueKind } from './types'

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

const ChannelSchema = z.number().int().min(0).max(255)

export const ColorValueSchema = z.union([
  z.tuple([ChannelSchema, ChannelSchema, ChannelSchema]),
  z.tuple([ChannelSchema, ChannelSchema, ChannelSchema, ChannelSchema]),
])

export const LayoutValueSchema: z.ZodType<LayoutValue> = z.lazy(() =>
  z.union([z.number().finite(), z.record(LayoutValueSchema)])
)

const MappingSchema = z.record(z.unknown())

// ============================================================================
// BUILD
// ============================================================================

export interface TreeBuild {
  tree: ConfigTree
  /** Human-readable notes about dropped blocks and rejected leaves */
  issues: string[]
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ')
}

// YAML anchors can alias a mapping inside itself
function isCyclic(value: unknown, ancestors: Set<object> = new Set()): boolean {
  if (typeof value !== 'object' || value === null) return false
  if (ancestors.has(value)) return true

  ancestors.add(value)
  const cyclic = Object.values(value).some((nested) => isCyclic(nested, ancestors))
  ancestors.delete(value)
  return cyclic
}

function freezeLayout(value: LayoutValue): LayoutValue {
  if (typeof value === 'number') return value
  for (const nested of Object.values(value)) {
    freezeLayout(nested)
  }
  return Object.freeze(value)
}

function toEntry(kind: ValueKind, raw: unknown): ThemeEntry {
  let entry: ThemeEntry
  if (kind === 'color') {
    const parsed = ColorValueSchema.safeParse(raw)
    if (parsed.success) {
      const value: ColorValue = parsed.data
      entry = { kind: 'color', value: Object.freeze(value) }
    } else {
      entry = {
        kind: 'missing',
        expected: kind,
        reason: `expected 3 or 4 integer channels in [0, 255]: ${describeIssues(parsed.error)}`,
        raw,
      }
    }
  } else if (isCyclic(raw)) {
    entry = {
      kind: 'missing',
      expected: kind,
      reason: 'expected a number or a mapping of numbers: mapping refers to itself',
      raw,
    }
  } else {
    const parsed = LayoutValueSchema.safeParse(raw)
    entry = parsed.success
      ? { kind: 'layout', value: freezeLayout(parsed.data) }
      : {
          kind: 'missing',
          expected: kind,
          reason: `expected a number or a mapping of numbers: ${describeIssues(parsed.error)}`,
          raw,
        }
  }
  return Object.freeze(entry)
}

function buildSection(
  block: unknown,
  kind: ValueKind,
  sectionName: string,
  issues: string[]
): TreeSection {
  const section = new Map<string, ReadonlyMap<string, ThemeEntry>>()
  if (block === undefined || block === null) {
    return section
  }

  const categories = MappingSchema.safeParse(block)
  if (!categories.success) {
    issues.push(`${sectionName} is not a mapping; ignored`)
    return section
  }

  for (const [category, rawEntries] of Object.entries(categories.data)) {
    const entries = MappingSchema.safeParse(rawEntries)
    if (!entries.success) {
      issues.push(`${sectionName}.${category} is not a mapping; ignored`)
      continue
    }

    const leaves = new Map<string, ThemeEntry>()
    for (const [key, raw] of Object.entries(entries.data)) {
      const entry = toEntry(kind, raw)
      if (entry.kind === 'missing') {
        issues.push(`${sectionName}.${category}.${key}: ${entry.reason}`)
      }
      leaves.set(key, entry)
    }
    section.set(category, leaves)
  }

  return section
}

/**
 * Build a tree from the contents of a `ui_theme` block.
 * An absent block yields an empty tree; a block that is not a mapping fails.
 */
export function buildConfigTree(block: unknown, origin: string): Result<TreeBuild> {
  const issues: string[] = []

  if (block === undefined || block === null) {
    return ok({ tree: Object.freeze({ origin, colors: new Map(), layout: new Map() }), issues })
  }

  const theme = MappingSchema.safeParse(block)
  if (!theme.success) {
    return err(
      new ThemeSourceError(`ui_theme in ${origin} must be a mapping`, {
        origin,
        stage: 'shape',
      })
    )
  }

  const tree: ConfigTree = Object.freeze({
    origin,
    colors: buildSection(theme.data.colors, 'color', 'colors', issues),
    layout: buildSection(theme.data.layout, 'layout', 'layout', issues),
  })

  return ok({ tree, issues })
}

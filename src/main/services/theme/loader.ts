/**
 * Theme Source Loader
 *
 * Reads a YAML document (global settings or a level file) and turns its
 * `ui_theme` block into a ConfigTree. This is the only place raw text is
 * parsed; failures come back as a ThemeSourceError result, never thrown.
 *
 * @module services/theme/loader
 */

import { readFile } from 'fs/promises'
import { load } from 'js-yaml'
import { z } from 'zod'
import { ThemeSourceError, err, getErrorMessage, ok, type Result } from '../../../shared/errors'
import type { TreeResult } from './store'
import { buildConfigTree, type TreeBuild } from './tree'

export type ThemeSourceReader = (path: string) => Promise<TreeResult>

const ThemeDocumentSchema = z.object({ ui_theme: z.unknown() }).passthrough()

/**
 * Parse YAML text. A document without a `ui_theme` block yields an empty tree.
 */
export function parseThemeDocument(text: string, origin: string): TreeResult {
  let document: unknown
  try {
    document = load(text, { filename: origin })
  } catch (error) {
    return err(
      new ThemeSourceError(`Invalid YAML in ${origin}: ${getErrorMessage(error)}`, {
        origin,
        stage: 'parse',
        cause: error instanceof Error ? error : undefined,
      })
    )
  }

  let block: unknown
  if (document !== undefined && document !== null) {
    const parsed = ThemeDocumentSchema.safeParse(document)
    if (!parsed.success) {
      return err(
        new ThemeSourceError(`${origin} must contain a mapping at the top level`, {
          origin,
          stage: 'shape',
        })
      )
    }
    block = parsed.data.ui_theme
  }

  let built: Result<TreeBuild>
  try {
    built = buildConfigTree(block, origin)
  } catch (error) {
    return err(
      new ThemeSourceError(`Unusable ui_theme in ${origin}: ${getErrorMessage(error)}`, {
        origin,
        stage: 'shape',
        cause: error instanceof Error ? error : undefined,
      })
    )
  }
  if (!built.success) {
    return err(built.error)
  }

  for (const issue of built.data.issues) {
    console.warn(`[ThemeLoader] ${origin}: ${issue}`)
  }
  return ok(built.data.tree)
}

/**
 * Read and parse a theme source from disk
 */
export async function loadThemeSource(path: string): Promise<TreeResult> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (error) {
    return err(
      new ThemeSourceError(`Cannot read theme source ${path}: ${getErrorMessage(error)}`, {
        origin: path,
        stage: 'read',
        cause: error instanceof Error ? error : undefined,
      })
    )
  }
  return parseThemeDocument(text, path)
}

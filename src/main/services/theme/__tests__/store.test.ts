/**
 * Config Store Tests
 *
 * @module store.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ThemeSourceError, err } from '../../../../shared/errors'
import { sourceOf } from '../../../../__tests__/fixtures/themes.fixture'
import { ConfigStore, type SwapEvent } from '../store'
import { EMPTY_TREE } from '../types'

function parseFailure(origin: string) {
  return err(new ThemeSourceError(`Invalid YAML in ${origin}`, { origin, stage: 'parse' }))
}

describe('ConfigStore', () => {
  let store: ConfigStore

  beforeEach(() => {
    store = new ConfigStore()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should start with an empty global tree and no level', () => {
    const snapshot = store.snapshot()

    expect(snapshot.global).toBe(EMPTY_TREE)
    expect(snapshot.level).toBeNull()
  })

  describe('loadGlobal', () => {
    it('should install the loaded tree', () => {
      const source = sourceOf({ colors: { icon: { gold: [1, 2, 3] } } }, 'settings.yaml')
      store.loadGlobal(source)

      expect(store.snapshot().global.origin).toBe('settings.yaml')
    })

    it('should install an empty tree when the source failed to parse', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {})
      store.loadGlobal(sourceOf({ colors: { icon: { gold: [1, 2, 3] } } }))

      store.loadGlobal(parseFailure('settings.yaml'))

      expect(store.snapshot().global).toBe(EMPTY_TREE)
      expect(error).toHaveBeenCalledWith(
        '[ConfigStore] Global theme unavailable, using defaults: Invalid YAML in settings.yaml'
      )
    })
  })

  describe('setLevel', () => {
    it('should replace the level tree wholesale', () => {
      const first = sourceOf({ colors: { icon: { hp: [1, 2, 3] } } }, 'levels/1.yaml')
      const second = sourceOf({ colors: { icon: { gold: [4, 5, 6] } } }, 'levels/2.yaml')

      store.setLevel(first)
      store.setLevel(second)

      expect(store.snapshot().level?.origin).toBe('levels/2.yaml')
      expect(store.snapshot().level?.colors.get('icon')?.has('hp')).toBe(false)
    })

    it('should clear the level for null', () => {
      store.setLevel(sourceOf({}))
      store.setLevel(null)

      expect(store.snapshot().level).toBeNull()
    })

    it('should apply no overrides when the level failed to parse', () => {
      store.setLevel(sourceOf({ colors: { icon: { hp: [1, 2, 3] } } }))

      store.setLevel(parseFailure('levels/broken.yaml'))

      expect(store.snapshot().level).toBeNull()
    })

    it('should leave the global tree untouched', () => {
      store.loadGlobal(sourceOf({}, 'settings.yaml'))
      const global = store.snapshot().global

      store.setLevel(sourceOf({}, 'levels/1.yaml'))
      store.clearLevel()

      expect(store.snapshot().global).toBe(global)
    })
  })

  describe('reload', () => {
    it('should swap the global tree and report success', () => {
      store.loadGlobal(sourceOf({}, 'settings.yaml'))

      const applied = store.reloadGlobal(sourceOf({}, 'settings.yaml#2'))

      expect(applied).toBe(true)
      expect(store.snapshot().global.origin).toBe('settings.yaml#2')
    })

    it('should keep the previous global tree when the reload failed', () => {
      store.loadGlobal(sourceOf({}, 'settings.yaml'))
      const before = store.snapshot().global

      const applied = store.reloadGlobal(parseFailure('settings.yaml'))

      expect(applied).toBe(false)
      expect(store.snapshot().global).toBe(before)
    })

    it('should keep the previous level tree when the reload failed', () => {
      store.setLevel(sourceOf({}, 'levels/1.yaml'))
      const before = store.snapshot().level

      expect(store.reloadLevel(parseFailure('levels/1.yaml'))).toBe(false)
      expect(store.snapshot().level).toBe(before)
    })

    it('should drop the level overrides on a null reload', () => {
      store.setLevel(sourceOf({}, 'levels/1.yaml'))

      expect(store.reloadLevel(null)).toBe(true)
      expect(store.snapshot().level).toBeNull()
    })
  })

  describe('snapshots', () => {
    it('should never mutate a snapshot already handed out', () => {
      store.loadGlobal(sourceOf({}, 'settings.yaml'))
      const before = store.snapshot()

      store.reloadGlobal(sourceOf({}, 'settings.yaml#2'))
      store.setLevel(sourceOf({}, 'levels/1.yaml'))

      expect(before.global.origin).toBe('settings.yaml')
      expect(before.level).toBeNull()
      expect(Object.isFrozen(store.snapshot())).toBe(true)
    })

    it('should emit a swap event for every publish', () => {
      const events: SwapEvent[] = []
      store.on('swap', (event: SwapEvent) => events.push(event))

      store.loadGlobal(sourceOf({}, 'settings.yaml'))
      store.setLevel(sourceOf({}, 'levels/1.yaml'))
      store.reloadGlobal(parseFailure('settings.yaml'))
      store.clearLevel()

      expect(events).toEqual([
        { tier: 'global', reason: 'load', origin: 'settings.yaml' },
        { tier: 'level', reason: 'set', origin: 'levels/1.yaml' },
        { tier: 'level', reason: 'clear', origin: null },
      ])
    })
  })
})

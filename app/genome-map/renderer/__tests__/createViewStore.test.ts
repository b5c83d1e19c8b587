import { describe, expect, it, vi } from 'vitest'

import { DEFAULT_STRAND_COLORS, IDENTITY_TRANSFORM } from '../constants'
import { createViewStore } from '../createViewStore'

describe('createViewStore', () => {
  it('starts from the default colors and the identity transform', () => {
    const state = createViewStore().getState()
    expect(state.colors).toEqual(DEFAULT_STRAND_COLORS)
    expect(state.transform).toEqual(IDENTITY_TRANSFORM)
    expect(state.scaleExtent).toEqual([0.5, 10])
  })

  it('merges color overrides per strand', () => {
    const store = createViewStore({ colors: { '-': '#00aa00' } })
    expect(store.getState().colors).toEqual({ '+': '#ff0000', '-': '#00aa00' })
  })

  it('keeps stores independent of each other', () => {
    const first = createViewStore()
    const second = createViewStore()
    first.getState().setStrandColor('+', '#123456')
    expect(second.getState().colors['+']).toBe('#ff0000')
  })

  it('reassigns one strand without touching the other', () => {
    const store = createViewStore()
    store.getState().setStrandColor('+', '#00ff00')
    expect(store.getState().colors).toEqual({ '+': '#00ff00', '-': '#0000ff' })
  })

  it('clamps the scale to the configured extent', () => {
    const store = createViewStore({ scaleExtent: [1, 4] })
    store.getState().setTransform({ translateX: 5, translateY: 6, scale: 40 })
    expect(store.getState().transform).toEqual({ translateX: 5, translateY: 6, scale: 4 })
    store.getState().setTransform({ translateX: 5, translateY: 6, scale: 0.01 })
    expect(store.getState().transform.scale).toBe(1)
  })

  it('notifies transform subscribers once for repeated identical transforms', () => {
    const store = createViewStore()
    const listener = vi.fn()
    store.subscribe((state) => state.transform, listener)

    store.getState().setTransform({ translateX: 10, translateY: 20, scale: 2 })
    store.getState().setTransform({ translateX: 10, translateY: 20, scale: 2 })
    expect(listener).toHaveBeenCalledTimes(1)

    store.getState().setStrandColor('-', '#0000ff')
    store.getState().setStrandColor('+', '#abcdef')
    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('resets the transform to identity', () => {
    const store = createViewStore()
    store.getState().setTransform({ translateX: 10, translateY: 20, scale: 2 })
    store.getState().resetTransform()
    expect(store.getState().transform).toEqual(IDENTITY_TRANSFORM)
  })
})

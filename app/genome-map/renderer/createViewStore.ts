// purpose: per-renderer view state (strand colors + canonical zoom transform)
// status: active
// depends_on: zustand

import { createStore } from 'zustand/vanilla'
import { subscribeWithSelector } from 'zustand/middleware'

import type { ScaleExtent, Strand, StrandColors, ViewTransform } from '../../types/genomeMap'
import { DEFAULT_STRAND_COLORS, IDENTITY_TRANSFORM, SCALE_EXTENT } from './constants'
import { clampScale } from './geometry'

export interface ViewState {
  colors: StrandColors
  transform: ViewTransform
  scaleExtent: ScaleExtent

  setStrandColor: (strand: Strand, color: string) => void
  setTransform: (transform: ViewTransform) => void
  resetTransform: () => void
}

export interface ViewStoreOptions {
  colors?: Partial<StrandColors>
  scaleExtent?: ScaleExtent
}

const sameTransform = (a: ViewTransform, b: ViewTransform) =>
  a.translateX === b.translateX && a.translateY === b.translateY && a.scale === b.scale

export const createViewStore = (options: ViewStoreOptions = {}) =>
  createStore<ViewState>()(
    subscribeWithSelector((set, get) => ({
      colors: { ...DEFAULT_STRAND_COLORS, ...options.colors },
      transform: IDENTITY_TRANSFORM,
      scaleExtent: options.scaleExtent ?? SCALE_EXTENT,

      setStrandColor: (strand, color) => {
        if (get().colors[strand] === color) return
        set((state) => ({ colors: { ...state.colors, [strand]: color } }))
      },

      setTransform: (transform) => {
        const next = { ...transform, scale: clampScale(transform.scale, get().scaleExtent) }
        if (sameTransform(get().transform, next)) return
        set({ transform: next })
      },

      resetTransform: () => set({ transform: IDENTITY_TRANSFORM }),
    })),
  )

export type ViewStore = ReturnType<typeof createViewStore>

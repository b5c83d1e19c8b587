import type { ScaleExtent, Strand, StrandColors, ViewTransform } from '../../types/genomeMap'

// Fallback viewport when the container has not been laid out yet.
export const DEFAULT_VIEWPORT_SIZE = 800

export const LABEL_MARGIN = 40
export const TRACK_WIDTH = 20

export const RING_STROKE = 'black'
export const RING_STROKE_WIDTH = 1.5

export const SCALE_EXTENT: ScaleExtent = [0.5, 10]

export const IDENTITY_TRANSFORM: ViewTransform = { translateX: 0, translateY: 0, scale: 1 }

export const DEFAULT_STRAND_COLORS: StrandColors = {
  '+': '#ff0000',
  '-': '#0000ff',
}

export const STRAND_LABELS: Record<Strand, string> = {
  '+': 'Plus strand (+)',
  '-': 'Minus strand (-)',
}

export const EXPORT_FONT_FAMILY = 'Arial, Helvetica, sans-serif'

export const TITLE_FONT_SIZE = '20px'

export const TOOLTIP = {
  nameFontSize: '12px',
  productFontSize: '10px',
  productColor: '#333',
  lineHeight: 15,
  productBudget: 25,
} as const

export const LEGEND = {
  offsetX: 20,
  offsetY: 20,
  swatchSize: 20,
  rowHeight: 70,
  labelOffsetX: 30,
  pickerOffsetY: 25,
  pickerWidth: 120,
  pickerHeight: 40,
} as const

export const RASTER_SCALE = 2
export const DEFAULT_EXPORT_BASENAME = 'genome_map'

export const LOG_PREFIX = '[genome-map]'

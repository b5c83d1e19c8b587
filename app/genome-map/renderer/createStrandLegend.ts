import * as d3 from 'd3'

import { STRANDS, type Strand, type StrandColors } from '../../types/genomeMap'
import { EXPORT_FONT_FAMILY, LEGEND, STRAND_LABELS } from './constants'

export interface StrandLegend {
  sync(colors: StrandColors): void
  swatchColor(strand: Strand): string | null
  dispose(): void
}

interface LegendRow {
  swatch: d3.Selection<SVGRectElement, unknown, null, undefined>
  picker: HTMLInputElement
  onInput: () => void
}

// Legend lives outside the zoom layer so it stays pinned to the top-left corner.
export function createStrandLegend(
  svg: d3.Selection<SVGSVGElement, unknown, null, undefined>,
  colors: StrandColors,
  onColorInput: (strand: Strand, color: string) => void,
): StrandLegend {
  let disposed = false

  const legend = svg
    .append('g')
    .attr('class', 'legend')
    .attr('transform', `translate(${LEGEND.offsetX}, ${LEGEND.offsetY})`)

  const rows = new Map<Strand, LegendRow>()

  STRANDS.forEach((strand, row) => {
    const top = row * LEGEND.rowHeight

    const swatch = legend
      .append('rect')
      .attr('class', 'legend-swatch')
      .attr('data-strand', strand)
      .attr('x', 0)
      .attr('y', top)
      .attr('width', LEGEND.swatchSize)
      .attr('height', LEGEND.swatchSize)
      .attr('fill', colors[strand])

    legend
      .append('text')
      .attr('class', 'legend-label')
      .attr('x', LEGEND.labelOffsetX)
      .attr('y', top + 15)
      .attr('font-size', '12px')
      .attr('font-family', EXPORT_FONT_FAMILY)
      .attr('fill', 'black')
      .text(STRAND_LABELS[strand])

    const picker = legend
      .append('foreignObject')
      .attr('data-export-ignore', '')
      .attr('x', 0)
      .attr('y', top + LEGEND.pickerOffsetY)
      .attr('width', LEGEND.pickerWidth)
      .attr('height', LEGEND.pickerHeight)
      .append('xhtml:div')
      .append('xhtml:input')
      .attr('type', 'color')
      .attr('aria-label', `${STRAND_LABELS[strand]} color`)
      .property('value', colors[strand])
      .node()

    if (!(picker instanceof HTMLInputElement)) {
      throw new Error(`Failed to create color control for strand ${strand}`)
    }

    const onInput = () => {
      if (disposed) return
      onColorInput(strand, picker.value)
    }
    picker.addEventListener('input', onInput)

    rows.set(strand, { swatch, picker, onInput })
  })

  return {
    sync(next) {
      if (disposed) return
      for (const [strand, row] of rows) {
        row.swatch.attr('fill', next[strand])
        if (row.picker.value !== next[strand]) {
          row.picker.value = next[strand]
        }
      }
    },
    swatchColor(strand) {
      return rows.get(strand)?.swatch.attr('fill') ?? null
    },
    dispose() {
      if (disposed) return
      disposed = true
      for (const row of rows.values()) {
        row.picker.removeEventListener('input', row.onInput)
      }
      rows.clear()
      legend.remove()
    },
  }
}

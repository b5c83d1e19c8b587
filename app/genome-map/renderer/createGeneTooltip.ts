import * as d3 from 'd3'

import type { GeneAnnotation } from '../../types/genomeMap'
import { EXPORT_FONT_FAMILY, TOOLTIP } from './constants'

export type TooltipState = 'idle' | 'showing'

export interface GeneTooltip {
  readonly state: TooltipState
  show(gene: GeneAnnotation, x: number, y: number): void
  hide(): void
  dispose(): void
}

export const truncateProduct = (product: string, budget: number = TOOLTIP.productBudget) =>
  product.length > budget ? `${product.substring(0, budget - 3)}...` : product

/**
 * One overlay shared by every arc. It is attached to the scene while a gene is
 * hovered and detached otherwise, so the scene never holds more than one.
 */
export function createGeneTooltip(
  scene: d3.Selection<SVGGElement, unknown, null, undefined>,
): GeneTooltip {
  let state: TooltipState = 'idle'
  let disposed = false

  const overlay = d3
    .create<SVGGElement>('svg:g')
    .attr('class', 'gene-tooltip')
    .attr('pointer-events', 'none')

  const nameLine = overlay
    .append('text')
    .attr('class', 'tooltip-text')
    .attr('text-anchor', 'middle')
    .attr('font-size', TOOLTIP.nameFontSize)
    .attr('font-weight', 'bold')
    .attr('font-family', EXPORT_FONT_FAMILY)
    .attr('fill', 'black')

  const productLine = overlay
    .append('text')
    .attr('class', 'tooltip-product')
    .attr('text-anchor', 'middle')
    .attr('font-size', TOOLTIP.productFontSize)
    .attr('font-family', EXPORT_FONT_FAMILY)
    .attr('fill', TOOLTIP.productColor)

  const overlayNode = overlay.node()

  return {
    get state() {
      return state
    },
    show(gene, x, y) {
      if (disposed || !overlayNode) return
      nameLine.attr('x', x).attr('y', y).text(gene.name)
      productLine
        .attr('x', x)
        .attr('y', y + TOOLTIP.lineHeight)
        .attr('display', gene.product ? null : 'none')
        .text(truncateProduct(gene.product))
      const sceneNode = scene.node()
      if (sceneNode && overlayNode.parentNode !== sceneNode) {
        sceneNode.appendChild(overlayNode)
      }
      state = 'showing'
    },
    hide() {
      overlay.remove()
      state = 'idle'
    },
    dispose() {
      if (disposed) return
      disposed = true
      overlay.remove()
      state = 'idle'
    },
  }
}

// purpose: map genomic coordinates onto the circular track
// status: active
// depends_on: d3

import * as d3 from 'd3'

import type {
  GeneAnnotation,
  GeneArc,
  ScaleExtent,
  TrackRadii,
  ViewTransform,
} from '../../types/genomeMap'
import { LABEL_MARGIN, TRACK_WIDTH } from './constants'

export type AngleScale = (position: number) => number

/**
 * Linear map from `[0, genomeLength]` to `[0, 2π]`. d3's arc generator puts
 * angle 0 at 12 o'clock and runs clockwise, so no rotation offset is applied.
 */
export const createAngleScale = (genomeLength: number): AngleScale => {
  const scale = d3.scaleLinear().domain([0, genomeLength]).range([0, 2 * Math.PI])
  return (position: number) => scale(position)
}

export const computeRadii = (width: number, height: number): TrackRadii => {
  const baseRadius = Math.min(width, height) / 2 - LABEL_MARGIN
  const outerRadius = Math.max(baseRadius, TRACK_WIDTH)
  return { outerRadius, innerRadius: outerRadius - TRACK_WIDTH }
}

export interface ArcLayout {
  arcs: GeneArc[]
  warnings: string[]
}

export const describeGene = (gene: GeneAnnotation, index: number) =>
  `gene #${index} "${gene.name}" (${gene.contig}:${gene.start}-${gene.end})`

export const layoutGeneArcs = (genes: GeneAnnotation[], genomeLength: number): ArcLayout => {
  const angleOf = createAngleScale(genomeLength)
  const arcs: GeneArc[] = []
  const warnings: string[] = []

  genes.forEach((gene, index) => {
    // Arcs crossing the origin are not drawn; the track has no wrap-around segment.
    if (gene.end < gene.start) {
      warnings.push(`Skipped ${describeGene(gene, index)}: end precedes start`)
      return
    }
    const startAngle = angleOf(gene.start)
    const endAngle = angleOf(gene.end)
    if (!Number.isFinite(startAngle) || !Number.isFinite(endAngle)) {
      warnings.push(`Skipped ${describeGene(gene, index)}: angles are not finite`)
      return
    }
    arcs.push({ index, gene, startAngle, endAngle })
  })

  return { arcs, warnings }
}

export const describeGeneArc = (arc: GeneArc, radii: TrackRadii): string => {
  const generator = d3
    .arc<GeneArc>()
    .innerRadius(radii.innerRadius)
    .outerRadius(radii.outerRadius)
    .startAngle((d) => d.startAngle)
    .endAngle((d) => d.endAngle)
  return generator(arc) ?? ''
}

export const clampScale = (scale: number, [min, max]: ScaleExtent) =>
  Math.max(min, Math.min(max, scale))

export const toScenePoint = (
  [x, y]: readonly [number, number],
  transform: ViewTransform,
  center: readonly [number, number],
): [number, number] => [
  (x - transform.translateX) / transform.scale - center[0],
  (y - transform.translateY) / transform.scale - center[1],
]

export const formatTransform = ({ translateX, translateY, scale }: ViewTransform) =>
  `translate(${translateX},${translateY}) scale(${scale})`

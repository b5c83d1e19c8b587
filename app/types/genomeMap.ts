export type Strand = '+' | '-'

export const STRANDS: readonly Strand[] = ['+', '-']

export interface GeneAnnotation {
  contig: string
  start: number
  end: number
  strand: Strand
  name: string
  product: string
}

export interface GenomeMapPayload {
  genes: GeneAnnotation[]
  genomeLength: number
  filename: string
}

export type StrandColors = Record<Strand, string>

export interface ViewTransform {
  translateX: number
  translateY: number
  scale: number
}

export interface GeneArc {
  index: number
  gene: GeneAnnotation
  startAngle: number
  endAngle: number
}

export interface TrackRadii {
  innerRadius: number
  outerRadius: number
}

export type ScaleExtent = readonly [number, number]

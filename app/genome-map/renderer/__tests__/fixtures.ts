import type { GeneAnnotation, GenomeMapPayload } from '../../../types/genomeMap'
import type { RasterCanvas, RasterContext } from '../exportScene'

export const buildGene = (overrides: Partial<GeneAnnotation> = {}): GeneAnnotation => ({
  contig: 'chr1',
  start: 0,
  end: 100,
  strand: '+',
  name: 'geneA',
  product: '',
  ...overrides,
})

export const buildPayload = (overrides: Partial<GenomeMapPayload> = {}): GenomeMapPayload => ({
  genes: [],
  genomeLength: 1000,
  filename: 'sample_genome',
  ...overrides,
})

export const mixedStrandGenes = (): GeneAnnotation[] => [
  buildGene({ name: 'geneA', start: 0, end: 120, strand: '+', product: 'ribosomal subunit assembly factor' }),
  buildGene({ name: 'geneB', start: 200, end: 320, strand: '-', product: 'toxin' }),
  buildGene({ name: 'geneC', start: 400, end: 650, strand: '+' }),
  buildGene({ name: 'geneD', start: 700, end: 980, strand: '-' }),
]

export interface RecordingCanvas extends RasterCanvas {
  calls: string[]
  drawnSources: string[]
}

// Records drawing calls in order; `toBlob` answers with a PNG-typed blob.
export const createRecordingCanvas = (): RecordingCanvas => {
  const calls: string[] = []
  const drawnSources: string[] = []
  const context: RasterContext = {
    fillStyle: '',
    fillRect: (x: number, y: number, w: number, h: number) => {
      calls.push(`fillRect ${String(context.fillStyle)} ${x},${y},${w},${h}`)
    },
    scale: (x: number, y: number) => {
      calls.push(`scale ${x},${y}`)
    },
    drawImage: (image: CanvasImageSource, ...coordinates: number[]) => {
      drawnSources.push('src' in image ? image.src : '')
      calls.push(`drawImage ${coordinates.join(',')}`)
    },
  }
  return {
    width: 0,
    height: 0,
    calls,
    drawnSources,
    getContext: () => context,
    toBlob: (callback, type) => {
      calls.push(`toBlob ${type ?? ''}`)
      callback(new Blob(['png'], { type: type ?? '' }))
    },
  }
}

// Stand-ins for the global Image: decoding settles on the next microtask.
export class DecodingImage {
  onload: (() => void) | null = null
  onerror: (() => void) | null = null
  private source = ''

  get src() {
    return this.source
  }

  set src(value: string) {
    this.source = value
    queueMicrotask(() => this.onload?.())
  }
}

export class UndecodableImage {
  onload: (() => void) | null = null
  onerror: (() => void) | null = null

  set src(_value: string) {
    queueMicrotask(() => this.onerror?.())
  }
}

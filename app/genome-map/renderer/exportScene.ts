// purpose: serialize and rasterize a prepared genome map scene
// status: active
// depends_on: browser XMLSerializer, canvas

import { DEFAULT_EXPORT_BASENAME, RASTER_SCALE } from './constants'

export type ExportFormat = 'svg' | 'png'

export class ExportError extends Error {
  constructor(
    readonly format: ExportFormat,
    message: string,
    readonly details?: unknown,
  ) {
    super(message)
    this.name = 'ExportError'
  }
}

export interface ExportArtifact {
  format: ExportFormat
  filename: string
  blob: Blob
}

export interface SvgArtifact extends ExportArtifact {
  format: 'svg'
  markup: string
}

export const exportFilename = (filename: string, format: ExportFormat) =>
  `${filename || DEFAULT_EXPORT_BASENAME}.${format}`

export const EXPORT_IGNORE_SELECTOR = '[data-export-ignore]'

/** Serializes a copy of `svg` without its interactive-only nodes. */
export const serializeScene = (svg: SVGSVGElement): string => {
  const copy = svg.cloneNode(true)
  if (!(copy instanceof Element)) {
    throw new ExportError('svg', 'Failed to copy the genome map scene')
  }
  copy.querySelectorAll(EXPORT_IGNORE_SELECTOR).forEach((node) => node.remove())
  try {
    return new XMLSerializer().serializeToString(copy)
  } catch (error) {
    throw new ExportError('svg', 'Failed to serialize the genome map', error)
  }
}

export const svgDataUrl = (markup: string) =>
  `data:image/svg+xml;charset=utf-8,${encodeURIComponent(markup)}`

export type RasterContext = Pick<CanvasRenderingContext2D, 'fillStyle' | 'fillRect' | 'scale' | 'drawImage'>

// The part of HTMLCanvasElement the rasterizer touches.
export interface RasterCanvas {
  width: number
  height: number
  getContext(contextId: '2d'): RasterContext | null
  toBlob(callback: BlobCallback, type?: string): void
}

const loadImage = (src: string) =>
  new Promise<HTMLImageElement>((resolve, reject) => {
    const image = new Image()
    image.onload = () => resolve(image)
    image.onerror = () => reject(new ExportError('png', 'Failed to decode the genome map image'))
    image.src = src
  })

const canvasToBlob = (canvas: RasterCanvas) =>
  new Promise<Blob>((resolve, reject) => {
    canvas.toBlob((blob) => {
      if (blob) {
        resolve(blob)
      } else {
        reject(new ExportError('png', 'Failed to encode the genome map as PNG'))
      }
    }, 'image/png')
  })

export interface RasterizeOptions {
  width: number
  height: number
  scale?: number
  /** Canvas to draw on; a fresh DOM canvas when omitted. */
  createCanvas?: () => RasterCanvas
}

const createDomCanvas = (): RasterCanvas => document.createElement('canvas')

/** Draws `markup` onto an opaque white canvas at `scale`× and encodes it as PNG. */
export const rasterizeScene = async (
  markup: string,
  { width, height, scale = RASTER_SCALE, createCanvas = createDomCanvas }: RasterizeOptions,
): Promise<Blob> => {
  const canvas = createCanvas()
  canvas.width = width * scale
  canvas.height = height * scale
  const context = canvas.getContext('2d')
  if (!context) {
    throw new ExportError('png', 'Canvas 2D context is unavailable')
  }
  context.fillStyle = 'white'
  context.fillRect(0, 0, canvas.width, canvas.height)
  context.scale(scale, scale)

  const image = await loadImage(svgDataUrl(markup))
  context.drawImage(image, 0, 0, width, height)
  return canvasToBlob(canvas)
}

export const downloadArtifact = ({ blob, filename }: ExportArtifact) => {
  const url = URL.createObjectURL(blob)
  const link = document.createElement('a')
  link.href = url
  link.download = filename
  document.body.appendChild(link)
  link.click()
  document.body.removeChild(link)
  URL.revokeObjectURL(url)
}

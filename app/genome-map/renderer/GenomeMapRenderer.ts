// purpose: imperative d3 renderer for the circular genome map
// status: active
// depends_on: d3, zustand/vanilla, app/genome-map/renderer/*

import * as d3 from 'd3'

import {
  STRANDS,
  type GeneArc,
  type GenomeMapPayload,
  type ScaleExtent,
  type Strand,
  type StrandColors,
  type TrackRadii,
  type ViewTransform,
} from '../../types/genomeMap'
import {
  DEFAULT_VIEWPORT_SIZE,
  EXPORT_FONT_FAMILY,
  LOG_PREFIX,
  RING_STROKE,
  RING_STROKE_WIDTH,
  TITLE_FONT_SIZE,
} from './constants'
import { createExportControls, type ExportControls } from './createExportControls'
import { createGeneTooltip, type GeneTooltip, type TooltipState } from './createGeneTooltip'
import { createStrandLegend, type StrandLegend } from './createStrandLegend'
import { createViewStore, type ViewStore } from './createViewStore'
import {
  ExportError,
  downloadArtifact,
  exportFilename,
  rasterizeScene,
  serializeScene,
  type ExportArtifact,
  type ExportFormat,
  type RasterCanvas,
  type SvgArtifact,
} from './exportScene'
import {
  computeRadii,
  describeGeneArc,
  formatTransform,
  layoutGeneArcs,
  toScenePoint,
} from './geometry'

export interface GenomeMapRendererOptions {
  width?: number
  height?: number
  colors?: Partial<StrandColors>
  scaleExtent?: ScaleExtent
  /** Append the "Download SVG" / "Download PNG" buttons to the container (default: true). */
  exportControls?: boolean
  onExportError?: (error: ExportError) => void
  /** Canvas factory for PNG export; a DOM canvas when omitted. */
  createCanvas?: () => RasterCanvas
}

type SvgSelection = d3.Selection<SVGSVGElement, unknown, null, undefined>
type GroupSelection = d3.Selection<SVGGElement, unknown, null, undefined>

/**
 * Owns one container for the lifetime of one genome load. Geometry is computed
 * once in the constructor; zoom, hover and recolor only mutate the existing
 * nodes. A new genome gets a new instance after `destroy()`.
 */
export class GenomeMapRenderer {
  readonly width: number
  readonly height: number
  readonly radii: TrackRadii
  readonly arcs: readonly GeneArc[]
  readonly warnings: readonly string[]

  private readonly store: ViewStore
  private readonly svg: SvgSelection
  private readonly zoomLayer: GroupSelection
  private readonly scene: GroupSelection
  private readonly zoomBehavior: d3.ZoomBehavior<SVGSVGElement, unknown>
  private readonly arcsByStrand = new Map<Strand, SVGPathElement[]>()
  private readonly tooltip: GeneTooltip
  private readonly legend: StrandLegend
  private readonly controls: ExportControls | null
  private readonly unsubscribers: Array<() => void> = []
  private readonly previousPosition: string | null
  private destroyed = false

  constructor(
    private readonly container: HTMLElement,
    readonly payload: GenomeMapPayload,
    private readonly options: GenomeMapRendererOptions = {},
  ) {
    d3.select(container).selectAll('*').remove()

    this.width = options.width ?? (container.offsetWidth || DEFAULT_VIEWPORT_SIZE)
    this.height = options.height ?? (container.offsetHeight || DEFAULT_VIEWPORT_SIZE)
    this.radii = computeRadii(this.width, this.height)
    this.store = createViewStore({ colors: options.colors, scaleExtent: options.scaleExtent })

    const layout = layoutGeneArcs(payload.genes, payload.genomeLength)
    this.arcs = layout.arcs
    this.warnings = layout.warnings
    for (const warning of layout.warnings) {
      console.warn(LOG_PREFIX, warning)
    }

    this.svg = d3
      .select(container)
      .append('svg')
      .attr('xmlns', 'http://www.w3.org/2000/svg')
      .attr('class', 'genome-map-svg')
      .attr('width', this.width)
      .attr('height', this.height)
      .attr('font-family', EXPORT_FONT_FAMILY)

    this.zoomLayer = this.svg
      .append('g')
      .attr('class', 'genome-map-zoom')
      .attr('transform', formatTransform(this.transform))
    this.scene = this.zoomLayer
      .append('g')
      .attr('class', 'genome-map-scene')
      .attr('transform', `translate(${this.width / 2}, ${this.height / 2})`)

    this.drawRings()
    this.drawTitle(payload.filename)
    this.drawArcs()
    this.tooltip = createGeneTooltip(this.scene)
    this.legend = createStrandLegend(this.svg, this.colors, (strand, color) =>
      this.setStrandColor(strand, color),
    )

    const [minScale, maxScale] = this.store.getState().scaleExtent
    this.zoomBehavior = d3
      .zoom<SVGSVGElement, unknown>()
      .scaleExtent([minScale, maxScale])
      .extent([
        [0, 0],
        [this.width, this.height],
      ])
      .on('zoom', (event: d3.D3ZoomEvent<SVGSVGElement, unknown>) => {
        const { x, y, k } = event.transform
        this.store.getState().setTransform({ translateX: x, translateY: y, scale: k })
      })
    this.svg.call(this.zoomBehavior)

    this.unsubscribers.push(
      this.store.subscribe(
        (state) => state.transform,
        (transform) => this.zoomLayer.attr('transform', formatTransform(transform)),
      ),
      this.store.subscribe(
        (state) => state.colors,
        (colors, previous) => this.applyColors(colors, previous),
      ),
    )

    if (options.exportControls === false) {
      this.previousPosition = null
      this.controls = null
    } else {
      const { position } = getComputedStyle(container)
      const isStatic = position === '' || position === 'static'
      this.previousPosition = isStatic ? container.style.position : null
      if (isStatic) container.style.position = 'relative'
      this.controls = createExportControls(container, (format) => {
        void this.download(format)
      })
    }

    console.info(
      LOG_PREFIX,
      `Rendered ${this.arcs.length} of ${payload.genes.length} genes for "${payload.filename}"`,
    )
  }

  get colors(): StrandColors {
    return this.store.getState().colors
  }

  get transform(): ViewTransform {
    return this.store.getState().transform
  }

  get tooltipState(): TooltipState {
    return this.tooltip.state
  }

  get isDestroyed() {
    return this.destroyed
  }

  get svgElement(): SVGSVGElement | null {
    return this.destroyed ? null : this.svg.node()
  }

  /** Arc nodes indexed at construction time, optionally limited to one strand. */
  arcNodes(strand?: Strand): SVGPathElement[] {
    if (strand) return [...(this.arcsByStrand.get(strand) ?? [])]
    return STRANDS.flatMap((s) => this.arcsByStrand.get(s) ?? [])
  }

  legendSwatchColor(strand: Strand): string | null {
    return this.legend.swatchColor(strand)
  }

  setStrandColor(strand: Strand, color: string) {
    if (this.destroyed) return
    this.store.getState().setStrandColor(strand, color)
  }

  setTransform(transform: ViewTransform) {
    if (this.destroyed) return
    this.store.getState().setTransform(transform)
    const { translateX, translateY, scale } = this.transform
    // Keep d3-zoom's own state in step so the next gesture starts from here.
    this.zoomBehavior.transform(this.svg, d3.zoomIdentity.translate(translateX, translateY).scale(scale))
  }

  resetZoom() {
    if (this.destroyed) return
    this.store.getState().resetTransform()
    this.zoomBehavior.transform(this.svg, d3.zoomIdentity)
  }

  /**
   * Puts the live scene in its export form: legend swatches match the view
   * store, the tooltip is detached and every text node has a concrete font.
   * Pan and zoom are left as they are.
   */
  prepareForExport() {
    if (this.destroyed) return
    this.legend.sync(this.colors)
    this.tooltip.hide()
    this.svg.attr('font-family', EXPORT_FONT_FAMILY)
    this.svg.selectAll('text').attr('font-family', EXPORT_FONT_FAMILY)
  }

  exportSvg(): SvgArtifact {
    const node = this.svgElement
    if (!node) throw new ExportError('svg', 'Genome map has been destroyed')
    this.prepareForExport()
    const markup = serializeScene(node)
    return {
      format: 'svg',
      filename: exportFilename(this.payload.filename, 'svg'),
      blob: new Blob([markup], { type: 'image/svg+xml' }),
      markup,
    }
  }

  async exportPng(): Promise<ExportArtifact> {
    const node = this.svgElement
    if (!node) throw new ExportError('png', 'Genome map has been destroyed')
    this.prepareForExport()
    const markup = serializeScene(node)
    const blob = await rasterizeScene(markup, {
      width: this.width,
      height: this.height,
      createCanvas: this.options.createCanvas,
    })
    return { format: 'png', filename: exportFilename(this.payload.filename, 'png'), blob }
  }

  /** Export handler behind the download buttons; failures are reported, never thrown. */
  async download(format: ExportFormat): Promise<boolean> {
    try {
      const artifact = format === 'svg' ? this.exportSvg() : await this.exportPng()
      downloadArtifact(artifact)
      return true
    } catch (error) {
      const exportError =
        error instanceof ExportError
          ? error
          : new ExportError(format, `Failed to export genome map as ${format.toUpperCase()}`, error)
      console.error(LOG_PREFIX, exportError.message, exportError.details ?? '')
      this.options.onExportError?.(exportError)
      return false
    }
  }

  destroy() {
    if (this.destroyed) return
    this.destroyed = true
    for (const unsubscribe of this.unsubscribers) unsubscribe()
    this.unsubscribers.length = 0
    this.svg.interrupt().on('.zoom', null)
    this.tooltip.dispose()
    this.legend.dispose()
    this.controls?.dispose()
    this.arcsByStrand.clear()
    d3.select(this.container).selectAll('*').remove()
    if (this.previousPosition !== null) {
      this.container.style.position = this.previousPosition
    }
  }

  private drawRings() {
    for (const radius of [this.radii.outerRadius, this.radii.innerRadius]) {
      this.scene
        .append('circle')
        .attr('class', 'genome-map-ring')
        .attr('r', radius)
        .attr('fill', 'none')
        .attr('stroke', RING_STROKE)
        .attr('stroke-width', RING_STROKE_WIDTH)
    }
  }

  private drawTitle(filename: string) {
    this.scene
      .append('text')
      .attr('class', 'genome-map-title')
      .attr('x', 0)
      .attr('y', 0)
      .attr('text-anchor', 'middle')
      .attr('font-size', TITLE_FONT_SIZE)
      .attr('font-weight', 'bold')
      .attr('font-family', EXPORT_FONT_FAMILY)
      .attr('fill', 'black')
      .text(filename)
  }

  private drawArcs() {
    const colors = this.colors
    for (const strand of STRANDS) this.arcsByStrand.set(strand, [])

    const index = this.arcsByStrand
    this.scene
      .append('g')
      .attr('class', 'gene-arcs')
      .selectAll<SVGPathElement, GeneArc>('path')
      .data(this.arcs)
      .join('path')
      .attr('class', 'gene-arc')
      .attr('d', (d) => describeGeneArc(d, this.radii))
      .attr('fill', (d) => colors[d.gene.strand])
      .attr('stroke', 'none')
      .attr('data-index', (d) => d.index)
      .attr('data-strand', (d) => d.gene.strand)
      .on('mouseenter', (event: MouseEvent, d) => this.showTooltip(event, d))
      .on('mouseleave', () => this.tooltip.hide())
      .each(function (d) {
        index.get(d.gene.strand)?.push(this)
      })
  }

  private showTooltip(event: MouseEvent, arc: GeneArc) {
    const node = this.svg.node()
    if (this.destroyed || !node) return
    const rect = node.getBoundingClientRect()
    const [x, y] = toScenePoint(
      [event.clientX - rect.left, event.clientY - rect.top],
      this.transform,
      [this.width / 2, this.height / 2],
    )
    this.tooltip.show(arc.gene, x, y)
  }

  private applyColors(colors: StrandColors, previous: StrandColors) {
    for (const strand of STRANDS) {
      if (colors[strand] === previous[strand]) continue
      d3.selectAll(this.arcsByStrand.get(strand) ?? []).attr('fill', colors[strand])
    }
    this.legend.sync(colors)
  }
}

export * from './GenomeMapRenderer'
export * from './createGenomeMapController'
export * from './constants'
export { ExportError, downloadArtifact, exportFilename, serializeScene, type ExportArtifact, type ExportFormat, type RasterCanvas, type RasterContext, type SvgArtifact } from './exportScene'
export { createAngleScale, computeRadii, layoutGeneArcs } from './geometry'
export { GenomePayloadError, parseGenomeMapMessage } from './payload'

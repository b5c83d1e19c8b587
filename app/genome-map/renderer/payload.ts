// purpose: decode inbound genome map messages into a validated payload
// status: active
// depends_on: zod

import { z } from 'zod'

import type { GeneAnnotation, GenomeMapPayload } from '../../types/genomeMap'

export class GenomePayloadError extends Error {
  constructor(message: string, readonly details?: unknown) {
    super(message)
    this.name = 'GenomePayloadError'
  }
}

const optionalLabel = z.string().nullish()

const geneRecordSchema = z.object({
  contig: z.string(),
  start: z.number().int(),
  end: z.number().int(),
  strand: z.enum(['+', '-']),
  name: optionalLabel,
  attributes: optionalLabel,
  product: optionalLabel,
})

const messageSchema = z.object({
  genes: z.array(geneRecordSchema),
  genomeLength: z.number().int().positive(),
  filename: optionalLabel,
})

export type GeneRecord = z.infer<typeof geneRecordSchema>

export const UNKNOWN_GENE_NAME = 'Unknown'

export const toGeneAnnotation = (record: GeneRecord): GeneAnnotation => ({
  contig: record.contig,
  start: record.start,
  end: record.end,
  strand: record.strand,
  name: record.name || record.attributes || UNKNOWN_GENE_NAME,
  product: record.product ?? '',
})

const decodeGenes = (genes: unknown): unknown => {
  if (typeof genes !== 'string') return genes
  try {
    return JSON.parse(genes)
  } catch (error) {
    throw new GenomePayloadError('Failed to parse genes JSON', error)
  }
}

const formatIssues = (error: z.ZodError) =>
  error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
    .join('; ')

/**
 * Accepts the dashboard message with `genes` either as an array or as a JSON
 * string. Throws `GenomePayloadError` when the message cannot be used.
 */
export const parseGenomeMapMessage = (message: unknown): GenomeMapPayload => {
  if (typeof message !== 'object' || message === null) {
    throw new GenomePayloadError('Genome map message must be an object')
  }
  const candidate = {
    ...message,
    genes: 'genes' in message ? decodeGenes(message.genes) : undefined,
  }
  const result = messageSchema.safeParse(candidate)
  if (!result.success) {
    throw new GenomePayloadError(`Invalid genome map payload: ${formatIssues(result.error)}`, result.error)
  }
  return {
    genes: result.data.genes.map(toGeneAnnotation),
    genomeLength: result.data.genomeLength,
    filename: result.data.filename ?? '',
  }
}

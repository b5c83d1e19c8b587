import type { GenomeMapPayload } from '../../types/genomeMap'
import { LOG_PREFIX } from './constants'
import { GenomeMapRenderer, type GenomeMapRendererOptions } from './GenomeMapRenderer'
import { GenomePayloadError, parseGenomeMapMessage } from './payload'

export type GenomeMapRenderResult =
  | { status: 'rendered'; renderer: GenomeMapRenderer }
  | { status: 'aborted'; error: Error }

export interface GenomeMapController {
  readonly renderer: GenomeMapRenderer | null
  /** Handler boundary for inbound messages: never throws. */
  handleMessage(message: unknown): GenomeMapRenderResult
  destroy(): void
}

const toError = (error: unknown) =>
  error instanceof Error ? error : new Error(String(error))

export function createGenomeMapController(
  container: HTMLElement,
  options: GenomeMapRendererOptions = {},
): GenomeMapController {
  let renderer: GenomeMapRenderer | null = null
  let disposed = false

  const teardown = () => {
    renderer?.destroy()
    renderer = null
  }

  return {
    get renderer() {
      return renderer
    },
    handleMessage(message) {
      if (disposed) {
        return { status: 'aborted', error: new Error('Genome map controller has been destroyed') }
      }

      let payload: GenomeMapPayload
      try {
        payload = parseGenomeMapMessage(message)
      } catch (error) {
        const reason = toError(error)
        console.error(LOG_PREFIX, reason.message, reason instanceof GenomePayloadError ? reason.details ?? '' : '')
        return { status: 'aborted', error: reason }
      }

      // The previous scene and its listeners go away before the new one is built.
      teardown()
      try {
        renderer = new GenomeMapRenderer(container, payload, options)
        return { status: 'rendered', renderer }
      } catch (error) {
        const reason = toError(error)
        console.error(LOG_PREFIX, 'Error in visualization logic:', reason)
        container.replaceChildren()
        return { status: 'aborted', error: reason }
      }
    },
    destroy() {
      if (disposed) return
      disposed = true
      teardown()
    },
  }
}

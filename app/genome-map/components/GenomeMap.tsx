'use client'

// purpose: host the circular genome map renderer inside a React tree
// status: active
// depends_on: app/genome-map/renderer, app/store/useNotifications.ts

import React, { useEffect, useRef, useState } from 'react'

import { Alert } from '../../components/ui/Alert'
import { useNotifications } from '../../store/useNotifications'
import {
  createGenomeMapController,
  type ExportError,
  type GenomeMapController,
  type GenomeMapRenderer,
} from '../renderer'

export interface GenomeMapProps {
  /** Raw dashboard message; `genes` may be an array or a JSON string. */
  message: unknown
  height?: number
  onRendered?: (renderer: GenomeMapRenderer) => void
}

export const GenomeMap: React.FC<GenomeMapProps> = ({ message, height = 800, onRendered }) => {
  const containerRef = useRef<HTMLDivElement | null>(null)
  const controllerRef = useRef<GenomeMapController | null>(null)
  const onRenderedRef = useRef(onRendered)
  const [error, setError] = useState<string | null>(null)
  const notify = useNotifications((state) => state.notify)

  onRenderedRef.current = onRendered

  useEffect(() => {
    if (!containerRef.current) return
    const controller = createGenomeMapController(containerRef.current, {
      onExportError: (exportError: ExportError) => {
        notify({
          type: 'alert',
          category: 'export',
          priority: 'high',
          title: `${exportError.format.toUpperCase()} export failed`,
          message: exportError.message,
        })
      },
    })
    controllerRef.current = controller
    return () => {
      controller.destroy()
      controllerRef.current = null
    }
  }, [notify])

  useEffect(() => {
    const controller = controllerRef.current
    if (!controller || message == null) return
    const result = controller.handleMessage(message)
    if (result.status === 'rendered') {
      setError(null)
      onRenderedRef.current?.(result.renderer)
    } else {
      setError(result.error.message)
    }
  }, [message])

  return (
    <div className="space-y-4">
      {error && (
        <Alert variant="error" title="Genome map unavailable">
          {error}
        </Alert>
      )}
      <div
        ref={containerRef}
        data-testid="genome-map"
        className="relative w-full"
        style={{ height }}
      />
    </div>
  )
}

import React from 'react'
import { cleanup, fireEvent, render, screen, waitFor } from '@testing-library/react'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { useNotifications } from '../../../store/useNotifications'
import { GenomeMap } from '../GenomeMap'

// purpose: React host wires the renderer controller, inline errors and export toasts
// status: active

const message = (filename: string) => ({
  genes: [
    { contig: 'chr1', start: 0, end: 250, strand: '+', name: 'geneA', product: 'toxin' },
    { contig: 'chr1', start: 400, end: 520, strand: '-', attributes: 'ID=cds-2' },
  ],
  genomeLength: 1000,
  filename,
})

describe('GenomeMap', () => {
  beforeEach(() => {
    useNotifications.setState({ realTimeNotifications: [] })
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    cleanup()
    vi.restoreAllMocks()
  })

  it('renders the map for a dashboard message', () => {
    const onRendered = vi.fn()
    render(<GenomeMap message={message('sample_genome')} onRendered={onRendered} />)

    const host = screen.getByTestId('genome-map')
    expect(host.querySelectorAll('svg.genome-map-svg')).toHaveLength(1)
    expect(host.querySelector('.genome-map-title')?.textContent).toBe('sample_genome')
    expect(host.querySelectorAll('path.gene-arc')).toHaveLength(2)
    expect(onRendered).toHaveBeenCalledTimes(1)
    expect(screen.queryByText('Genome map unavailable')).toBeNull()
  })

  it('replaces the map when a new message arrives', () => {
    const { rerender } = render(<GenomeMap message={message('first')} />)
    rerender(<GenomeMap message={message('second')} />)

    const host = screen.getByTestId('genome-map')
    expect(host.querySelectorAll('svg.genome-map-svg')).toHaveLength(1)
    expect(host.querySelector('.genome-map-title')?.textContent).toBe('second')
  })

  it('shows an inline alert and keeps the previous map for a broken message', () => {
    const { rerender } = render(<GenomeMap message={message('first')} />)
    rerender(<GenomeMap message={{ ...message('broken'), genes: '[{"contig": ' }} />)

    expect(screen.getByText('Genome map unavailable')).toBeTruthy()
    expect(screen.getByText('Failed to parse genes JSON')).toBeTruthy()
    expect(screen.getByTestId('genome-map').querySelector('.genome-map-title')?.textContent).toBe('first')
  })

  it('renders nothing before the first message', () => {
    render(<GenomeMap message={null} />)
    expect(screen.getByTestId('genome-map').childElementCount).toBe(0)
  })

  it('raises a toast when a PNG export fails', async () => {
    vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockImplementation(() => null)
    render(<GenomeMap message={message('sample_genome')} />)

    fireEvent.click(screen.getByText('Download PNG'))

    await waitFor(() => expect(useNotifications.getState().realTimeNotifications).toHaveLength(1))
    const [toast] = useNotifications.getState().realTimeNotifications
    expect(toast).toMatchObject({
      type: 'alert',
      category: 'export',
      priority: 'high',
      title: 'PNG export failed',
      message: 'Canvas 2D context is unavailable',
    })
  })

  it('destroys the map on unmount', () => {
    const { unmount } = render(<GenomeMap message={message('sample_genome')} />)
    const host = screen.getByTestId('genome-map')
    unmount()
    expect(host.childElementCount).toBe(0)
  })
})

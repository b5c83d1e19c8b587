import type { ReactNode } from 'react'
import React from 'react'
import { renderHook, waitFor } from '@testing-library/react'
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import api from '../../api/client'
import { useGenomeMap } from '../useGenomeMap'

vi.mock('../../api/client', () => ({
  default: {
    get: vi.fn(),
  },
}))

// purpose: ensure the genome map hook fetches raw dashboard messages by id
// status: active

const withClient = (client: QueryClient) => {
  return ({ children }: { children: ReactNode }) => (
    <QueryClientProvider client={client}>{children}</QueryClientProvider>
  )
}

describe('useGenomeMap', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('fetches the message for a map id', async () => {
    const sample = {
      genes: '[{"contig":"chr1","start":0,"end":120,"strand":"+","name":"geneA"}]',
      genomeLength: 1000,
      filename: 'sample_genome',
    }
    ;(api.get as ReturnType<typeof vi.fn>).mockResolvedValue({ data: sample })

    const qc = new QueryClient({ defaultOptions: { queries: { retry: false } } })
    const { result } = renderHook(() => useGenomeMap('map 1'), {
      wrapper: withClient(qc),
    })

    await waitFor(() => expect(result.current.isSuccess).toBe(true))
    expect(result.current.data).toEqual(sample)
    expect(api.get).toHaveBeenCalledWith('/api/genome-maps/map%201')
  })

  it('stays idle without a map id', () => {
    const qc = new QueryClient({ defaultOptions: { queries: { retry: false } } })
    const { result } = renderHook(() => useGenomeMap(null), {
      wrapper: withClient(qc),
    })

    expect(result.current.fetchStatus).toBe('idle')
    expect(api.get).not.toHaveBeenCalled()
  })
})

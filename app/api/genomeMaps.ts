'use client'

// purpose: genome map payload endpoints exposed by the dashboard
// status: active

import api from './client'

// The body is the raw dashboard message; decoding happens in the renderer controller.
export const getGenomeMapMessage = async (mapId: string): Promise<unknown> => {
  if (!mapId) throw new Error('Genome map id is required')
  const response = await api.get<unknown>(`/api/genome-maps/${encodeURIComponent(mapId)}`)
  return response.data
}

'use client'

// purpose: fetch a genome map message for the map route
// status: active
// depends_on: @tanstack/react-query, app/api/genomeMaps

import { useQuery } from '@tanstack/react-query'

import { getGenomeMapMessage } from '../api/genomeMaps'

export const useGenomeMap = (mapId: string | null) => {
  return useQuery({
    queryKey: ['genomeMap', mapId],
    enabled: Boolean(mapId),
    queryFn: async () => {
      if (!mapId) throw new Error('Genome map id is required')
      return getGenomeMapMessage(mapId)
    },
    staleTime: 60_000,
  })
}

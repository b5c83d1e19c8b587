'use client'

// purpose: live genome map route fed by dashboard postMessage events
// status: active

import { EmptyState } from '../components/ui'
import { useGenomeMapMessages } from '../hooks/useGenomeMapMessages'
import { GenomeMap } from './components/GenomeMap'

const GenomeMapPage = () => {
  const message = useGenomeMapMessages({
    allowedOrigin: process.env.NEXT_PUBLIC_DASHBOARD_ORIGIN || undefined,
  })

  return (
    <div className="container mx-auto space-y-6 px-6 py-10">
      {message == null && (
        <EmptyState
          title="Waiting for genome annotations"
          description="Generate a map from the dashboard to render it here."
        />
      )}
      <GenomeMap message={message} />
    </div>
  )
}

export default GenomeMapPage

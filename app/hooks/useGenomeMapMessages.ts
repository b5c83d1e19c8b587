'use client'

// purpose: receive genome map messages posted by the hosting dashboard
// status: active

import { useEffect, useState } from 'react'

export const GENOME_MAP_MESSAGE_TYPE = 'updateGenomeMap'

export interface GenomeMapMessageEnvelope {
  type: typeof GENOME_MAP_MESSAGE_TYPE
  payload: unknown
}

export const isGenomeMapEnvelope = (data: unknown): data is GenomeMapMessageEnvelope =>
  typeof data === 'object' &&
  data !== null &&
  'type' in data &&
  data.type === GENOME_MAP_MESSAGE_TYPE &&
  'payload' in data

export interface UseGenomeMapMessagesOptions {
  /** Only accept messages from this origin. Messages from any origin are accepted when omitted. */
  allowedOrigin?: string
}

/** Latest `updateGenomeMap` payload posted to this window, or `null` before the first one. */
export const useGenomeMapMessages = ({ allowedOrigin }: UseGenomeMapMessagesOptions = {}) => {
  const [message, setMessage] = useState<unknown>(null)

  useEffect(() => {
    const handler = (event: MessageEvent<unknown>) => {
      if (allowedOrigin && event.origin !== allowedOrigin) return
      if (!isGenomeMapEnvelope(event.data)) return
      console.info('[genome-map] Received updateGenomeMap message')
      setMessage(event.data.payload)
    }
    window.addEventListener('message', handler)
    return () => window.removeEventListener('message', handler)
  }, [allowedOrigin])

  return message
}

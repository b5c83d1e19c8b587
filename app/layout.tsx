'use client'
import './styles/globals.css'
import { ReactNode, useState } from 'react'
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import { NotificationProvider } from './components/notifications'

export default function RootLayout({ children }: { children: ReactNode }) {
  const [queryClient] = useState(() => new QueryClient({
    defaultOptions: {
      queries: {
        retry: 1,
        refetchOnWindowFocus: false,
        staleTime: 5 * 60 * 1000, // 5 minutes
      },
    },
  }))

  return (
    <html lang="en" className="h-full">
      <body className="h-full bg-neutral-50 text-neutral-900 font-sans antialiased">
        <QueryClientProvider client={queryClient}>
          <main id="main" className="min-h-full">
            {children}
          </main>
          <NotificationProvider />
        </QueryClientProvider>
      </body>
    </html>
  )
}

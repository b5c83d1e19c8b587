import React from 'react'
import { Loader2 } from 'lucide-react'
import { cn } from '../../utils/cn'

export interface LoadingStateProps {
  title?: string
  description?: string
  className?: string
}

const LoadingState: React.FC<LoadingStateProps> = ({ title, description, className }) => (
  <div className={cn('flex flex-col items-center justify-center p-8 text-center', className)}>
    <Loader2 className="w-8 h-8 animate-spin text-sky-600 mb-4" aria-hidden />
    {title && <h3 className="text-lg font-medium text-neutral-900 mb-2">{title}</h3>}
    {description && <p className="text-sm text-neutral-600">{description}</p>}
  </div>
)

export interface EmptyStateProps {
  title: string
  description?: string
  action?: React.ReactNode
  className?: string
}

const EmptyState: React.FC<EmptyStateProps> = ({ title, description, action, className }) => (
  <div className={cn('flex flex-col items-center justify-center p-8 text-center', className)}>
    <h3 className="text-lg font-medium text-neutral-900 mb-2">{title}</h3>
    {description && <p className="text-sm text-neutral-600 mb-4">{description}</p>}
    {action}
  </div>
)

export { LoadingState, EmptyState }

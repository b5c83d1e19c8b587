import React from 'react'
import { AlertTriangle, CheckCircle2, Info, X, XCircle } from 'lucide-react'
import type { LucideIcon } from 'lucide-react'
import { cn } from '../../utils/cn'

export type AlertVariant = 'success' | 'warning' | 'error' | 'info'

export interface AlertProps extends React.HTMLAttributes<HTMLDivElement> {
  variant?: AlertVariant
  title?: string
  onDismiss?: () => void
  children: React.ReactNode
}

const variants: Record<AlertVariant, { className: string; icon: LucideIcon }> = {
  success: { className: 'bg-green-50 border-green-200 text-green-800', icon: CheckCircle2 },
  warning: { className: 'bg-amber-50 border-amber-200 text-amber-800', icon: AlertTriangle },
  error: { className: 'bg-red-50 border-red-200 text-red-800', icon: XCircle },
  info: { className: 'bg-sky-50 border-sky-200 text-sky-800', icon: Info },
}

const Alert = React.forwardRef<HTMLDivElement, AlertProps>(
  ({ className, variant = 'info', title, onDismiss, children, ...props }, ref) => {
    const { className: variantClassName, icon: Icon } = variants[variant]

    return (
      <div
        ref={ref}
        className={cn('p-4 rounded-md border text-sm', variantClassName, className)}
        role="alert"
        {...props}
      >
        <div className="flex items-start gap-3">
          <Icon className="w-5 h-5 flex-shrink-0" aria-hidden />
          <div className="flex-grow">
            {title && <h4 className="font-medium mb-1">{title}</h4>}
            <div>{children}</div>
          </div>
          {onDismiss && (
            <button
              type="button"
              onClick={onDismiss}
              className="p-1 rounded-md hover:bg-black/5 transition-colors"
              aria-label="Dismiss alert"
            >
              <X className="w-4 h-4" />
            </button>
          )}
        </div>
      </div>
    )
  }
)

Alert.displayName = 'Alert'

export { Alert }

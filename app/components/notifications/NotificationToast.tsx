'use client'
import React, { useCallback, useEffect, useState } from 'react'
import { X, AlertCircle, Download } from 'lucide-react'
import type { LucideIcon } from 'lucide-react'
import { cn } from '../../utils/cn'
import type {
  NotificationCategory,
  NotificationPriority,
  NotificationType,
  RealTimeNotification,
} from '../../types/notifications'

interface NotificationToastProps {
  notification: RealTimeNotification
  onDismiss: (id: string) => void
  className?: string
}

const AUTO_DISMISS_MS = 5000
const EXIT_ANIMATION_MS = 300

const categoryIcons: Record<NotificationCategory, LucideIcon> = {
  export: Download,
}

const priorityColors: Record<NotificationPriority, string> = {
  low: 'border-green-200 bg-green-50 text-green-800',
  medium: 'border-yellow-200 bg-yellow-50 text-yellow-800',
  high: 'border-orange-200 bg-orange-50 text-orange-800',
  urgent: 'border-red-200 bg-red-50 text-red-800',
}

const typeIcons: Record<NotificationType, LucideIcon> = {
  alert: AlertCircle,
}

export const NotificationToast: React.FC<NotificationToastProps> = ({
  notification,
  onDismiss,
  className
}) => {
  const [isVisible, setIsVisible] = useState(false)
  const [isDismissing, setIsDismissing] = useState(false)

  const IconComponent = categoryIcons[notification.category]
  const TypeIcon = typeIcons[notification.type]

  const handleDismiss = useCallback(() => {
    setIsDismissing(true)
    setTimeout(() => onDismiss(notification.id), EXIT_ANIMATION_MS)
  }, [notification.id, onDismiss])

  useEffect(() => {
    // Animate in
    const timer = setTimeout(() => setIsVisible(true), 100)

    // Urgent toasts stay until dismissed
    const dismissTimer = setTimeout(() => {
      if (notification.priority !== 'urgent') {
        handleDismiss()
      }
    }, AUTO_DISMISS_MS)

    return () => {
      clearTimeout(timer)
      clearTimeout(dismissTimer)
    }
  }, [notification.priority, handleDismiss])

  return (
    <div
      role="alert"
      className={cn(
        'relative w-96 max-w-sm bg-white rounded-lg shadow-lg border border-neutral-200 transform transition-all duration-300 ease-in-out',
        isVisible && !isDismissing ? 'translate-x-0 opacity-100' : 'translate-x-full opacity-0',
        priorityColors[notification.priority],
        className
      )}
    >
      <div className="p-4">
        <div className="flex items-start space-x-3">
          <div className="flex-shrink-0">
            <div className="relative">
              <IconComponent className="w-5 h-5" />
              <TypeIcon className="absolute -bottom-1 -right-1 w-3 h-3 bg-white rounded-full" />
            </div>
          </div>

          <div className="flex-1 min-w-0">
            <div className="flex items-start justify-between">
              <div className="flex-1">
                <h4 className="text-sm font-medium text-current mb-1">
                  {notification.title}
                </h4>
                <p className="text-sm text-current/80">
                  {notification.message}
                </p>
              </div>

              <button
                onClick={handleDismiss}
                className="flex-shrink-0 p-1 rounded-md hover:bg-current/10 transition-colors"
                title="Dismiss"
                aria-label="Dismiss notification"
              >
                <X className="w-4 h-4" />
              </button>
            </div>
          </div>
        </div>
      </div>
    </div>
  )
}

interface ToastContainerProps {
  notifications: RealTimeNotification[]
  onDismiss: (id: string) => void
  className?: string
}

export const ToastContainer: React.FC<ToastContainerProps> = ({
  notifications,
  onDismiss,
  className
}) => {
  return (
    <div className={cn(
      'fixed top-4 right-4 z-50 space-y-2',
      className
    )}>
      {notifications.map((notification) => (
        <NotificationToast
          key={notification.id}
          notification={notification}
          onDismiss={onDismiss}
        />
      ))}
    </div>
  )
}

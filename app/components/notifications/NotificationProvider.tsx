'use client'

import React from 'react'

import { ToastContainer } from './NotificationToast'
import { useNotifications } from '../../store/useNotifications'

// purpose: render global toasts from the notification store
// status: active
// depends_on: app/store/useNotifications.ts

export const NotificationProvider: React.FC = () => {
  const realTimeNotifications = useNotifications((state) => state.realTimeNotifications)
  const removeRealTimeNotification = useNotifications((state) => state.removeRealTimeNotification)

  return (
    <ToastContainer
      notifications={realTimeNotifications}
      onDismiss={removeRealTimeNotification}
    />
  )
}

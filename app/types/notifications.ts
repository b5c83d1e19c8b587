export type NotificationCategory = 'export'

export type NotificationPriority = 'low' | 'medium' | 'high' | 'urgent'

export type NotificationType = 'alert'

export interface RealTimeNotification {
  id: string
  type: NotificationType
  title: string
  message: string
  category: NotificationCategory
  priority: NotificationPriority
  created_at: string
}

export type NotificationInput = Omit<RealTimeNotification, 'id' | 'created_at'> & {
  id?: string
}

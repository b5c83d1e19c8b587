import { create } from 'zustand'

import type { NotificationInput, RealTimeNotification } from '../types/notifications'

// Toasts beyond this count are dropped oldest-first.
const MAX_VISIBLE = 10

interface NotificationState {
  realTimeNotifications: RealTimeNotification[]

  addRealTimeNotification: (notification: RealTimeNotification) => void
  removeRealTimeNotification: (id: string) => void
  notify: (input: NotificationInput) => string
  clearAll: () => void
}

let sequence = 0

const nextId = () => {
  sequence += 1
  return `notification-${Date.now()}-${sequence}`
}

export const useNotifications = create<NotificationState>()((set, get) => ({
  realTimeNotifications: [],

  addRealTimeNotification: (notification) =>
    set((state) => {
      const existing = state.realTimeNotifications.filter((n) => n.id !== notification.id)
      const next = [notification, ...existing]
      return {
        realTimeNotifications: next.slice(0, MAX_VISIBLE),
      }
    }),

  removeRealTimeNotification: (id) =>
    set((state) => ({
      realTimeNotifications: state.realTimeNotifications.filter((notification) => notification.id !== id),
    })),

  notify: ({ id, ...input }) => {
    const notification: RealTimeNotification = {
      ...input,
      id: id ?? nextId(),
      created_at: new Date().toISOString(),
    }
    get().addRealTimeNotification(notification)
    return notification.id
  },

  clearAll: () => set({ realTimeNotifications: [] }),
}))

import React from 'react'
import { act, cleanup, fireEvent, render, screen } from '@testing-library/react'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { RealTimeNotification } from '../../../types/notifications'
import { NotificationToast, ToastContainer } from '../NotificationToast'

const exportFailure: RealTimeNotification = {
  id: 'notif-1',
  type: 'alert',
  title: 'PNG export failed',
  message: 'Canvas 2D context is unavailable',
  category: 'export',
  priority: 'high',
  created_at: '2024-01-01T00:00:00.000Z',
}

describe('NotificationToast', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    cleanup()
    vi.useRealTimers()
  })

  it('shows the title and message', () => {
    render(<NotificationToast notification={exportFailure} onDismiss={vi.fn()} />)
    expect(screen.getByText('PNG export failed')).toBeTruthy()
    expect(screen.getByText('Canvas 2D context is unavailable')).toBeTruthy()
  })

  it('dismisses itself after the display period', () => {
    const onDismiss = vi.fn()
    render(<NotificationToast notification={exportFailure} onDismiss={onDismiss} />)

    act(() => {
      vi.advanceTimersByTime(5300)
    })
    expect(onDismiss).toHaveBeenCalledWith('notif-1')
  })

  it('keeps urgent toasts until dismissed by hand', () => {
    const onDismiss = vi.fn()
    render(<NotificationToast notification={{ ...exportFailure, priority: 'urgent' }} onDismiss={onDismiss} />)

    act(() => {
      vi.advanceTimersByTime(10_000)
    })
    expect(onDismiss).not.toHaveBeenCalled()

    fireEvent.click(screen.getByLabelText('Dismiss notification'))
    act(() => {
      vi.advanceTimersByTime(300)
    })
    expect(onDismiss).toHaveBeenCalledWith('notif-1')
  })
})

describe('ToastContainer', () => {
  afterEach(() => {
    cleanup()
  })

  it('renders one toast per notification', () => {
    render(
      <ToastContainer
        notifications={[exportFailure, { ...exportFailure, id: 'notif-2', title: 'SVG export failed' }]}
        onDismiss={vi.fn()}
      />,
    )
    expect(screen.getAllByRole('alert')).toHaveLength(2)
  })
})

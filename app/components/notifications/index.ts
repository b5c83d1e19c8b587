export { NotificationProvider } from './NotificationProvider'
export { NotificationToast, ToastContainer } from './NotificationToast'

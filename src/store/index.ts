export { createToastStore, createToastSlice, sameNotification, subscribeToGroup } from './toast.store'
export type { ToastStore, ToastStoreApi, ToastSlice, ToastStoreOptions, ToastStoreProps } from './toast.store'
export { createCornerLayout } from './corner-layout'
export type { CornerLayout, CornerSnapshot } from './corner-layout'

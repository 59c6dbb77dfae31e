export { CORNERS, DEFAULT_GROUP_ID, DEFAULT_KINDS, CONNECTION_FLASH_KINDS, DismissReason } from './config/constants'
export type { Corner } from './config/constants'
export { loadToastConfig, resolveToastConfig, readToastEnv, TOAST_ENV_KEYS } from './config/toast-config'

export { createToastStore, createToastSlice, createCornerLayout, subscribeToGroup } from './store'
export type { ToastStore, ToastStoreApi, ToastSlice, ToastStoreOptions, CornerLayout, CornerSnapshot } from './store'

export { createToaster, putToast } from './notifications/notify'
export type { Toaster } from './notifications/notify'
export { createFlashReconciler } from './notifications/flash-reconciler'
export type { FlashReconciler } from './notifications/flash-reconciler'
export { FlashBag, flashIdFor, flashKindsFor } from './notifications/flash'
export { renderStaticFlashes } from './notifications/channels/static'
export { mountToastGroup } from './notifications/toast-group'
export type {
  MountedToastGroup,
  LiveToastGroup,
  StaticToastGroup,
  ToastGroupOptions,
} from './notifications/toast-group'
export { ToastError, InvalidNotificationError, ToastConfigError } from './notifications/errors'
export type {
  Notification,
  NotificationInput,
  NotificationSource,
  EmitOptions,
  FlashMap,
  FlashSource,
  RenderFn,
  ToastRenderers,
  ToastRenderFn,
  ContainerClassFn,
} from './notifications/types'
export type { ToastConfig, ToastConfigInput, CornerContainer } from './scheme'

export { initializeObservability, shutdownObservability, structuredLogger } from './observability'

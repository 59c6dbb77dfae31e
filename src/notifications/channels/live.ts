import type { ToastConfig } from '@/src/scheme'
import { createToastStore, subscribeToGroup, type ToastStoreApi } from '@/src/store/toast.store'
import { structuredLogger } from '@/src/observability'
import { createFlashReconciler, type FlashReconciler } from '../flash-reconciler'
import { isFlashSource } from '../flash'
import { createToaster, type Toaster } from '../notify'
import type { FlashMap, FlashSource, Notification } from '../types'

export interface LiveChannel {
  store: ToastStoreApi
  toaster: Toaster
  reconciler: FlashReconciler
  list: () => Notification[]
  subscribe: (listener: (toasts: Notification[]) => void) => () => void
  unmount: () => void
}

/**
 * Wires a store, a toaster and a flash reconciler for one container.
 * A store passed in is shared with other surfaces and is left alone on unmount.
 */
export function openLiveChannel(config: ToastConfig, flash: FlashSource | FlashMap, store?: ToastStoreApi): LiveChannel {
  const ownsStore = store === undefined
  const activeStore = store ?? createToastStore({ defaultGroup: config.groupId })
  const toaster = createToaster(activeStore, config)
  const reconciler = createFlashReconciler(activeStore, config)

  const attachFlash = (): (() => void) => {
    if (isFlashSource(flash)) return reconciler.attach(flash)
    reconciler.reconcile(flash)
    return () => {}
  }
  const detach = attachFlash()

  const list = () => activeStore.getState().toastStore.list(config.groupId)

  const subscribe = (listener: (toasts: Notification[]) => void) =>
    subscribeToGroup(activeStore, config.groupId, listener)

  const unmount = () => {
    detach()
    if (ownsStore) activeStore.getState().toastStore.dispose()
    structuredLogger.debug('Live toast channel unmounted', { group: config.groupId, owns_store: ownsStore })
  }

  return { store: activeStore, toaster, reconciler, list, subscribe, unmount }
}

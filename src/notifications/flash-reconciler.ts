import { DismissReason } from '@/src/config/constants'
import type { ToastConfig } from '@/src/scheme'
import type { ToastStoreApi } from '@/src/store/toast.store'
import { structuredLogger } from '@/src/observability'
import { flashIdFor, flashKindsFor, flashMessageFor } from './flash'
import type { FlashMap, FlashSource } from './types'

export interface FlashReconciler {
  reconcile: (flash: FlashMap) => void
  attach: (source: FlashSource) => () => void
  reset: () => void
}

const log = structuredLogger.with({ component: 'flash_reconciler' })

/**
 * Mirrors a one-shot flash map into a toast store.
 *
 * Each occupied kind becomes one notification with an id derived from the kind, so
 * reconciling the same flash again (or from a second surface during a reconnect) never
 * duplicates it. Only a kind whose message is new or changed since the previous pass is
 * written. An unchanged flash therefore does not bring back a toast the user dismissed,
 * or overwrite one that client code has since updated.
 *
 * When a kind disappears from the flash, its notification is removed only if the store
 * still holds the reconciler's own version (source "flash").
 */
export function createFlashReconciler(store: ToastStoreApi, config: ToastConfig): FlashReconciler {
  const allowedKinds = flashKindsFor(config)
  // kind -> message written on the last pass
  const seen = new Map<string, string>()

  const reconcile = (flash: FlashMap) => {
    const { toastStore } = store.getState()

    for (const kind of Object.keys(flash)) {
      if (!allowedKinds.includes(kind)) {
        log.debug('Skipping flash of unknown kind', { kind })
      }
    }

    for (const kind of allowedKinds) {
      const message = flashMessageFor(flash, kind)
      if (message === undefined) continue
      if (seen.get(kind) === message) continue

      seen.set(kind, message)
      toastStore.upsert({
        id: flashIdFor(kind),
        kind,
        message,
        group: config.groupId,
        source: 'flash',
        title: null,
        renderers: null,
        durationMs: null,
      })
    }

    for (const kind of [...seen.keys()]) {
      if (flashMessageFor(flash, kind) !== undefined) continue

      seen.delete(kind)
      const id = flashIdFor(kind)
      if (toastStore.get(id)?.source === 'flash') {
        toastStore.remove(id, DismissReason.FLASH_CLEARED)
      }
    }

    const present = allowedKinds.filter((kind) => flashMessageFor(flash, kind) !== undefined)
    log.debug('Flash reconciled', { kinds: present.join(',') })
  }

  const attach = (source: FlashSource) => {
    reconcile(source.snapshot())
    if (!source.subscribe) return () => {}
    return source.subscribe(() => reconcile(source.snapshot()))
  }

  const reset = () => {
    seen.clear()
  }

  return { reconcile, attach, reset }
}

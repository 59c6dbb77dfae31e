import type { ToastConfig } from '@/src/scheme'
import { flashIdFor, flashMessageFor } from '../flash'
import type { FlashMap, Notification } from '../types'

/**
 * Renders a flash map as a fixed list for a surface without a live update channel.
 * There is no store behind it, so no timers, no emits and no dismissal state.
 * Connection error flashes are a live-only concern and are not included.
 */
export function renderStaticFlashes(flash: FlashMap, config: ToastConfig): readonly Notification[] {
  const toasts: Notification[] = []
  for (const kind of config.kinds) {
    const message = flashMessageFor(flash, kind)
    if (message === undefined) continue
    toasts.push(
      Object.freeze({
        id: flashIdFor(kind),
        kind,
        message,
        group: config.groupId,
        source: 'flash' as const,
      }),
    )
  }
  return Object.freeze(toasts)
}

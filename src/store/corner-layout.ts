import type { Corner } from '@/src/config/constants'
import { CornerContainersSchema, type CornerContainer } from '@/src/scheme'
import { ToastConfigError, formatIssues } from '@/src/notifications/errors'
import type { Notification } from '@/src/notifications/types'
import { subscribeToGroup, type ToastStoreApi } from './toast.store'

export type CornerSnapshot = Record<Corner, Notification[]>

export interface CornerLayout {
  containers: readonly CornerContainer[]
  containerFor: (corner: Corner) => string | undefined
  list: (corner: Corner) => Notification[]
  snapshot: () => CornerSnapshot
  subscribe: (corner: Corner, listener: (toasts: Notification[]) => void) => () => void
}

/**
 * Partitions a store into at most one container per screen corner.
 * Records whose group has no container are not placed in any corner.
 */
export function createCornerLayout(store: ToastStoreApi, containers: CornerContainer[]): CornerLayout {
  const result = CornerContainersSchema.safeParse(containers)
  if (!result.success) {
    throw new ToastConfigError('Invalid corner layout', { issues: formatIssues(result.error) })
  }
  const registered = result.data

  const containerFor = (corner: Corner) => registered.find((container) => container.corner === corner)?.id

  const list = (corner: Corner): Notification[] => {
    const id = containerFor(corner)
    return id === undefined ? [] : store.getState().toastStore.list(id)
  }

  const snapshot = (): CornerSnapshot => ({
    top_left: list('top_left'),
    top_right: list('top_right'),
    bottom_left: list('bottom_left'),
    bottom_right: list('bottom_right'),
  })

  // A corner without a container never changes, so there is nothing to watch
  const subscribe = (corner: Corner, listener: (toasts: Notification[]) => void) => {
    const id = containerFor(corner)
    if (id === undefined) return () => {}
    return subscribeToGroup(store, id, listener)
  }

  return { containers: registered, containerFor, list, snapshot, subscribe }
}

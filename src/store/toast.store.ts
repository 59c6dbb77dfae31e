import { createStore, type StateCreator, type StoreApi } from 'zustand/vanilla'
import { shallow } from 'zustand/vanilla/shallow'
import { v4 as uuidv4 } from 'uuid'
import { DEFAULT_GROUP_ID, DEFAULT_KIND, DismissReason } from '@/src/config/constants'
import { NotificationInputSchema, type NotificationInputType } from '@/src/scheme'
import { InvalidNotificationError, formatIssues } from '@/src/notifications/errors'
import type { Notification, NotificationInput, ToastRenderers } from '@/src/notifications/types'
import { metricsRecorder, structuredLogger } from '@/src/observability'

// ============================================================================
// Types
// ============================================================================

export interface ToastStoreOptions {
  defaultGroup?: string
  defaultKind?: string
}

export interface ToastStoreProps {
  // Every live notification across groups, in display order (oldest first)
  toasts: Notification[]
}

export interface ToastStore extends ToastStoreProps {
  upsert: (input: NotificationInput) => string
  remove: (id: string, reason?: DismissReason) => void
  get: (id: string) => Notification | undefined
  list: (group?: string) => Notification[]
  groups: () => string[]
  clear: (group?: string) => void
  dispose: () => void
}

export interface ToastSlice {
  toastStore: ToastStore
}

export type ToastStoreApi = StoreApi<ToastSlice>

type Timer = ReturnType<typeof setTimeout>

const log = structuredLogger.with({ component: 'toast_store' })

// ============================================================================
// Record helpers
// ============================================================================

function parseInput(input: NotificationInput): NotificationInputType {
  const result = NotificationInputSchema.safeParse(input)
  if (!result.success) {
    const issues = formatIssues(result.error)
    log.warn('Rejected notification', { id: input.id, issues: issues.join('; ') })
    throw new InvalidNotificationError('Invalid notification', { issues })
  }
  return result.data
}

// undefined keeps the current value, null (or a zero duration) clears it
function resolveOptional<T>(current: T | undefined, update: T | null | undefined): T | undefined {
  if (update === undefined) return current
  return update === null ? undefined : update
}

function normalizeDuration(update: number | null | undefined): number | null | undefined {
  return update === 0 ? null : update
}

function withOptionalFields(
  record: Notification,
  fields: { title?: string; renderers?: ToastRenderers; durationMs?: number },
): Notification {
  const next: Notification = {
    id: record.id,
    kind: record.kind,
    message: record.message,
    group: record.group,
    source: record.source,
  }
  if (fields.title !== undefined) next.title = fields.title
  if (fields.renderers !== undefined) next.renderers = fields.renderers
  if (fields.durationMs !== undefined) next.durationMs = fields.durationMs
  return next
}

function sameRenderers(a: ToastRenderers | undefined, b: ToastRenderers | undefined): boolean {
  if (a === b) return true
  if (!a || !b) return false
  return a.icon === b.icon && a.action === b.action && a.component === b.component
}

export function sameNotification(a: Notification, b: Notification): boolean {
  return (
    a.id === b.id &&
    a.kind === b.kind &&
    a.message === b.message &&
    a.title === b.title &&
    a.durationMs === b.durationMs &&
    a.group === b.group &&
    a.source === b.source &&
    sameRenderers(a.renderers, b.renderers)
  )
}

// ============================================================================
// Store Slice
// ============================================================================

export const createToastSlice =
  (options: ToastStoreOptions = {}): StateCreator<ToastSlice> =>
  (set, get) => {
    const defaultGroup = options.defaultGroup ?? DEFAULT_GROUP_ID
    const defaultKind = options.defaultKind ?? DEFAULT_KIND

    // Pending auto-dismiss timers, one per notification id
    const timers = new Map<string, Timer>()

    const cancelTimer = (id: string) => {
      const timer = timers.get(id)
      if (timer === undefined) return
      clearTimeout(timer)
      timers.delete(id)
    }

    const armTimer = (id: string, durationMs: number) => {
      cancelTimer(id)
      timers.set(
        id,
        setTimeout(() => {
          timers.delete(id)
          log.debug('Notification expired', { id, duration_ms: durationMs })
          get().toastStore.remove(id, DismissReason.EXPIRED)
        }, durationMs),
      )
    }

    const buildRecord = (id: string, parsed: NotificationInputType, existing: Notification | undefined) => {
      if (!existing) {
        if (parsed.message === undefined) {
          log.warn('Rejected notification without message', { id })
          throw new InvalidNotificationError('Invalid notification', { issues: ['message: Message is required'] })
        }
        return withOptionalFields(
          {
            id,
            kind: parsed.kind ?? defaultKind,
            message: parsed.message,
            group: parsed.group ?? defaultGroup,
            source: parsed.source ?? 'client',
          },
          {
            title: parsed.title ?? undefined,
            renderers: parsed.renderers ?? undefined,
            durationMs: normalizeDuration(parsed.durationMs) ?? undefined,
          },
        )
      }

      return withOptionalFields(
        {
          id,
          kind: parsed.kind ?? existing.kind,
          message: parsed.message ?? existing.message,
          group: parsed.group ?? existing.group,
          source: parsed.source ?? 'client',
        },
        {
          title: resolveOptional(existing.title, parsed.title),
          renderers: resolveOptional(existing.renderers, parsed.renderers),
          durationMs: resolveOptional(existing.durationMs, normalizeDuration(parsed.durationMs)),
        },
      )
    }

    const syncTimer = (record: Notification, parsed: NotificationInputType, isNew: boolean) => {
      if (parsed.durationMs === undefined && !isNew) return
      if (record.durationMs) {
        armTimer(record.id, record.durationMs)
      } else {
        cancelTimer(record.id)
      }
    }

    return {
      toastStore: {
        toasts: [],

        upsert: (input: NotificationInput) => {
          const parsed = parseInput(input)
          const id = parsed.id ?? uuidv4()
          const { toasts } = get().toastStore
          const index = toasts.findIndex((toast) => toast.id === id)
          const existing = index === -1 ? undefined : toasts[index]
          const record = buildRecord(id, parsed, existing)

          if (!existing) {
            set((state) => ({
              toastStore: { ...state.toastStore, toasts: [...state.toastStore.toasts, record] },
            }))
            log.debug('Notification inserted', { id, kind: record.kind, group: record.group, source: record.source })
            metricsRecorder.recordToastEmitted(record.kind, record.group, record.source)
            syncTimer(record, parsed, true)
            return id
          }

          // A group change moves the record to the end of its new group
          const promote = parsed.bringToFront === true || existing.group !== record.group
          const lastIndex = toasts.length - 1

          if (sameNotification(existing, record) && (!promote || index === lastIndex)) {
            syncTimer(record, parsed, false)
            return id
          }

          set((state) => {
            const current = state.toastStore.toasts
            const next = promote
              ? [...current.filter((toast) => toast.id !== id), record]
              : current.map((toast) => (toast.id === id ? record : toast))
            return { toastStore: { ...state.toastStore, toasts: next } }
          })
          log.debug('Notification updated', { id, group: record.group, promoted: promote })
          syncTimer(record, parsed, false)
          return id
        },

        remove: (id: string, reason: DismissReason = DismissReason.DISMISSED) => {
          cancelTimer(id)
          if (!get().toastStore.toasts.some((toast) => toast.id === id)) return

          set((state) => ({
            toastStore: {
              ...state.toastStore,
              toasts: state.toastStore.toasts.filter((toast) => toast.id !== id),
            },
          }))
          log.debug('Notification removed', { id, reason })
          metricsRecorder.recordToastRemoved(reason)
        },

        get: (id: string) => get().toastStore.toasts.find((toast) => toast.id === id),

        list: (group: string = defaultGroup) => get().toastStore.toasts.filter((toast) => toast.group === group),

        groups: () => {
          const seen: string[] = []
          for (const toast of get().toastStore.toasts) {
            if (!seen.includes(toast.group)) seen.push(toast.group)
          }
          return seen
        },

        clear: (group?: string) => {
          const { toasts } = get().toastStore
          const removed = toasts.filter((toast) => group === undefined || toast.group === group)
          if (removed.length === 0) return

          removed.forEach((toast) => cancelTimer(toast.id))
          set((state) => ({
            toastStore: {
              ...state.toastStore,
              toasts: state.toastStore.toasts.filter((toast) => group !== undefined && toast.group !== group),
            },
          }))
          log.debug('Notifications cleared', { group, count: removed.length })
          removed.forEach(() => metricsRecorder.recordToastRemoved(DismissReason.CLEARED))
        },

        dispose: () => {
          timers.forEach((timer) => clearTimeout(timer))
          timers.clear()
          if (get().toastStore.toasts.length === 0) return
          set((state) => ({ toastStore: { ...state.toastStore, toasts: [] } }))
        },
      },
    }
  }

// ============================================================================
// Factory
// ============================================================================

export function createToastStore(options: ToastStoreOptions = {}): ToastStoreApi {
  return createStore<ToastSlice>()(createToastSlice(options))
}

/**
 * Calls the listener only when the given group's list changes (compared record by record),
 * not on every store update.
 */
export function subscribeToGroup(
  store: ToastStoreApi,
  group: string,
  listener: (toasts: Notification[]) => void,
): () => void {
  let previous = store.getState().toastStore.list(group)
  return store.subscribe((state) => {
    const next = state.toastStore.list(group)
    if (shallow(previous, next)) return
    previous = next
    listener(next)
  })
}

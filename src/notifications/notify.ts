import { DismissReason } from '@/src/config/constants'
import { EmitInputSchema, type ToastConfig } from '@/src/scheme'
import type { ToastStoreApi } from '@/src/store/toast.store'
import { structuredLogger } from '@/src/observability'
import { InvalidNotificationError, formatIssues } from './errors'
import { FlashBag } from './flash'
import type { EmitOptions, NotificationInput, ToastRenderers } from './types'

export interface Toaster {
  emit: (kind: string, message: string, options?: EmitOptions) => string
  dismiss: (id: string) => void
}

const log = structuredLogger.with({ component: 'toaster' })

function collectRenderers(options: EmitOptions): ToastRenderers | undefined {
  const { icon, action, component } = options
  if (!icon && !action && !component) return undefined

  const renderers: ToastRenderers = {}
  if (icon) renderers.icon = icon
  if (action) renderers.action = action
  if (component) renderers.component = component
  return renderers
}

export function createToaster(store: ToastStoreApi, config: ToastConfig): Toaster {
  const emit = (kind: string, message: string, options: EmitOptions = {}) => {
    const result = EmitInputSchema.safeParse({ kind, message, options })
    if (!result.success) {
      const issues = formatIssues(result.error)
      log.warn('Rejected toast', { kind, issues: issues.join('; ') })
      throw new InvalidNotificationError('Invalid toast', { issues })
    }

    if (!config.kinds.includes(kind)) {
      log.warn('Rejected toast of unknown kind', { kind })
      throw new InvalidNotificationError(`Unknown toast kind: ${kind}`, {
        issues: [`kind: Expected one of ${config.kinds.join(', ')}`],
      })
    }

    const { toastStore } = store.getState()
    const isUpdate = options.id !== undefined && toastStore.get(options.id) !== undefined

    const input: NotificationInput = {
      id: options.id,
      kind,
      message,
      group: options.group ?? options.container ?? (isUpdate ? undefined : config.groupId),
      bringToFront: options.bringToFront,
    }
    if (options.title !== undefined) input.title = options.title

    const renderers = collectRenderers(options)
    if (renderers) input.renderers = renderers

    // New toasts fall back to the configured duration; updates keep their running timer
    if (options.durationMs !== undefined) {
      input.durationMs = options.durationMs
    } else if (!isUpdate && config.defaultDurationMs > 0) {
      input.durationMs = config.defaultDurationMs
    }

    return toastStore.upsert(input)
  }

  const dismiss = (id: string) => {
    store.getState().toastStore.remove(id, DismissReason.DISMISSED)
  }

  return { emit, dismiss }
}

/**
 * Pipeline helper that writes a toast to whichever target is at hand: a flash bag for a
 * server-rendered response, or a live toaster. Options only apply to the live path, since a
 * flash carries nothing but its message. Returns the target so calls can be chained; use
 * emit() directly when the id of the new toast is needed.
 */
export function putToast(target: FlashBag, kind: string, message: string, options?: EmitOptions): FlashBag
export function putToast(target: Toaster, kind: string, message: string, options?: EmitOptions): Toaster
export function putToast(
  target: FlashBag | Toaster,
  kind: string,
  message: string,
  options?: EmitOptions,
): FlashBag | Toaster {
  if (target instanceof FlashBag) {
    target.put(kind, message)
  } else {
    target.emit(kind, message, options)
  }
  return target
}

import type { Corner } from '@/src/config/constants'
import { resolveToastConfig } from '@/src/config/toast-config'
import type { ToastConfig, ToastConfigInput } from '@/src/scheme'
import type { ToastStoreApi } from '@/src/store/toast.store'
import { openLiveChannel, type LiveChannel } from './channels/live'
import { renderStaticFlashes } from './channels/static'
import { isFlashSource } from './flash'
import type { ContainerClassFn, FlashMap, FlashSource, Notification, ToastRenderFn } from './types'

export interface ToastGroupOptions {
  // Whether the display surface has a live update channel
  connected: boolean
  flash: FlashSource | FlashMap
  config?: ToastConfig | ToastConfigInput
  store?: ToastStoreApi
  render?: ToastRenderFn
  containerClass?: ContainerClassFn
}

interface MountedGroupBase {
  id: string
  corner: Corner
  config: ToastConfig
  render?: ToastRenderFn
  containerClass?: ContainerClassFn
}

export interface LiveToastGroup extends MountedGroupBase, LiveChannel {
  mode: 'live'
}

export interface StaticToastGroup extends MountedGroupBase {
  mode: 'static'
  toasts: readonly Notification[]
}

export type MountedToastGroup = LiveToastGroup | StaticToastGroup

/**
 * Mounts a toast container in the presentation context the surface supports.
 *
 * Connected surfaces get a live channel: emits, timers and flash reconciliation against a
 * store. Anything else gets the flash rendered once as a fixed list. The render and
 * container-class callbacks are handed back untouched for the rendering layer.
 */
export function mountToastGroup(options: ToastGroupOptions): MountedToastGroup {
  const config = resolveToastConfig(options.config)
  const base: MountedGroupBase = {
    id: config.groupId,
    corner: config.corner,
    config,
    render: options.render,
    containerClass: options.containerClass,
  }

  if (!options.connected) {
    const flash = isFlashSource(options.flash) ? options.flash.snapshot() : options.flash
    return { ...base, mode: 'static', toasts: renderStaticFlashes(flash, config) }
  }

  return { ...base, mode: 'live', ...openLiveChannel(config, options.flash, options.store) }
}

import type { Corner } from '@/src/config/constants'

// Render callbacks are supplied by the rendering layer and never called here
export type RenderFn = (...args: never[]) => unknown

export interface ToastRenderers {
  icon?: RenderFn
  action?: RenderFn
  component?: RenderFn
}

export type NotificationSource = 'client' | 'flash'

export interface Notification {
  id: string
  kind: string
  message: string
  title?: string
  renderers?: ToastRenderers
  durationMs?: number
  group: string
  source: NotificationSource
}

// Partial record accepted by upsert; null clears an optional field
export interface NotificationInput {
  id?: string
  kind?: string
  message?: string
  title?: string | null
  renderers?: ToastRenderers | null
  durationMs?: number | null
  group?: string
  source?: NotificationSource
  bringToFront?: boolean
}

export interface EmitOptions {
  id?: string
  title?: string
  icon?: RenderFn
  action?: RenderFn
  component?: RenderFn
  durationMs?: number
  group?: string
  container?: string
  bringToFront?: boolean
}

// One-shot messages keyed by kind, at most one per kind
export type FlashMap = Readonly<Record<string, string | undefined>>

export interface FlashSource {
  snapshot: () => FlashMap
  subscribe?: (listener: () => void) => () => void
}

export type ToastRenderFn = (notification: Notification) => unknown

export type ContainerClassFn = (container: { id: string; corner: Corner }) => unknown

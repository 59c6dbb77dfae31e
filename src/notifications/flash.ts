import { CONNECTION_FLASH_KINDS, FLASH_ID_PREFIX } from '@/src/config/constants'
import type { ToastConfig } from '@/src/scheme'
import type { FlashMap, FlashSource } from './types'

// Assumes at most one flash per kind; several messages of one kind would need another id scheme
export function flashIdFor(kind: string): string {
  return `${FLASH_ID_PREFIX}${kind}`
}

// Kinds the live channel accepts from a flash source, in display order
export function flashKindsFor(config: ToastConfig): string[] {
  const kinds = [...config.kinds]
  if (config.showClientAndServerFlashes) {
    for (const kind of CONNECTION_FLASH_KINDS) {
      if (!kinds.includes(kind)) kinds.push(kind)
    }
  }
  return kinds
}

// Own string entries only, so kinds such as "constructor" never resolve to inherited members
export function flashMessageFor(flash: FlashMap, kind: string): string | undefined {
  if (!Object.hasOwn(flash, kind)) return undefined
  const message: unknown = flash[kind]
  return typeof message === 'string' && message !== '' ? message : undefined
}

export function isFlashSource(value: FlashSource | FlashMap): value is FlashSource {
  return typeof value.snapshot === 'function'
}

/**
 * Producer-side holder for one-shot messages, at most one per kind.
 * The producer clears it once the messages have been shown.
 */
export class FlashBag implements FlashSource {
  private readonly entries = new Map<string, string>()
  private readonly listeners = new Set<() => void>()

  put(kind: string, message: string): this {
    if (this.entries.get(kind) === message) return this
    this.entries.set(kind, message)
    this.notify()
    return this
  }

  get(kind: string): string | undefined {
    return this.entries.get(kind)
  }

  clear(kind?: string): this {
    if (kind === undefined) {
      if (this.entries.size === 0) return this
      this.entries.clear()
    } else if (!this.entries.delete(kind)) {
      return this
    }
    this.notify()
    return this
  }

  snapshot = (): FlashMap => Object.freeze(Object.fromEntries(this.entries))

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private notify() {
    this.listeners.forEach((listener) => listener())
  }
}

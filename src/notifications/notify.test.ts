import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { resolveToastConfig } from '@/src/config/toast-config'
import { createToastStore, type ToastStoreApi } from '@/src/store/toast.store'
import { InvalidNotificationError } from './errors'
import { FlashBag } from './flash'
import { createToaster, putToast, type Toaster } from './notify'

describe('toaster', () => {
  let store: ToastStoreApi
  let toaster: Toaster

  const toastStore = () => store.getState().toastStore

  beforeEach(() => {
    vi.useFakeTimers()
    store = createToastStore()
    toaster = createToaster(store, resolveToastConfig())
  })

  afterEach(() => {
    toastStore().dispose()
    vi.useRealTimers()
  })

  it('emits a toast that expires after its duration', () => {
    const id = toaster.emit('info', 'Saved', { durationMs: 3000 })

    expect(toastStore().list()).toEqual([
      { id, kind: 'info', message: 'Saved', durationMs: 3000, group: 'toast-group', source: 'client' },
    ])

    vi.advanceTimersByTime(3000)
    expect(toastStore().list()).toEqual([])
  })

  it('applies the default duration to new toasts', () => {
    const id = toaster.emit('info', 'Saved')

    expect(toastStore().get(id)?.durationMs).toBe(6000)
    vi.advanceTimersByTime(5999)
    expect(toastStore().get(id)).toBeDefined()
    vi.advanceTimersByTime(1)
    expect(toastStore().get(id)).toBeUndefined()
  })

  it('keeps toasts without a default duration until dismissed', () => {
    const persistent = createToaster(store, resolveToastConfig({ defaultDurationMs: 0 }))
    const id = persistent.emit('error', 'Payment failed')

    vi.advanceTimersByTime(60_000)
    expect(toastStore().get(id)?.message).toBe('Payment failed')

    persistent.dismiss(id)
    expect(toastStore().get(id)).toBeUndefined()
  })

  it('updates an existing toast when its id is passed back', () => {
    const id = toaster.emit('info', 'Uploading', { title: 'Upload', durationMs: 0 })
    const sameId = toaster.emit('info', 'Uploaded', { id })

    expect(sameId).toBe(id)
    expect(toastStore().list()).toEqual([
      { id, kind: 'info', message: 'Uploaded', title: 'Upload', group: 'toast-group', source: 'client' },
    ])
  })

  it('does not restart the timer of an updated toast without a new duration', () => {
    const id = toaster.emit('info', 'Uploading', { durationMs: 3000 })
    vi.advanceTimersByTime(2000)
    toaster.emit('info', 'Uploaded', { id })

    vi.advanceTimersByTime(1000)
    expect(toastStore().get(id)).toBeUndefined()
  })

  it('routes to the requested container', () => {
    toaster.emit('info', 'Left side', { group: 'left' })
    toaster.emit('info', 'Right side', { container: 'right' })

    expect(toastStore().list('left').map((toast) => toast.message)).toEqual(['Left side'])
    expect(toastStore().list('right').map((toast) => toast.message)).toEqual(['Right side'])
  })

  it('bundles render callbacks without calling them', () => {
    const icon = vi.fn()
    const action = vi.fn()
    const id = toaster.emit('info', 'Undo available', { icon, action })

    expect(toastStore().get(id)?.renderers).toEqual({ icon, action })
    expect(icon).not.toHaveBeenCalled()
    expect(action).not.toHaveBeenCalled()
  })

  it('rejects kinds outside the configured set', () => {
    expect(() => toaster.emit('warning', 'Careful')).toThrow(InvalidNotificationError)
    expect(toastStore().list()).toEqual([])
  })

  it('rejects an emit duration longer than a timer can wait', () => {
    expect(() => toaster.emit('info', 'Saved', { durationMs: 2_147_483_648 })).toThrow(InvalidNotificationError)
    expect(toastStore().list()).toEqual([])
  })

  it('rejects an empty message', () => {
    try {
      toaster.emit('info', '')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidNotificationError)
      if (error instanceof InvalidNotificationError) {
        expect(error.details?.issues).toEqual(['message: Message is required'])
      }
    }
  })
})

describe('putToast', () => {
  it('writes only the message to a flash bag', () => {
    const bag = new FlashBag()

    const result = putToast(bag, 'info', 'Thank you for logging in!', { title: 'Welcome' })

    expect(result).toBe(bag)
    expect(bag.snapshot()).toEqual({ info: 'Thank you for logging in!' })
  })

  it('emits through a live toaster and supports chaining', () => {
    const store = createToastStore()
    const toaster = createToaster(store, resolveToastConfig({ defaultDurationMs: 0 }))

    putToast(putToast(toaster, 'info', 'First'), 'error', 'Second', { title: 'Oops' })

    expect(store.getState().toastStore.list().map((toast) => [toast.kind, toast.message, toast.title])).toEqual([
      ['info', 'First', undefined],
      ['error', 'Second', 'Oops'],
    ])
  })
})

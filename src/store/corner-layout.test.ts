import { describe, it, expect, vi } from 'vitest'
import { ToastConfigError } from '@/src/notifications/errors'
import { createCornerLayout } from './corner-layout'
import { createToastStore } from './toast.store'

describe('corner layout', () => {
  it('maps each container to its corner', () => {
    const store = createToastStore()
    const layout = createCornerLayout(store, [
      { id: 'toast-group', corner: 'bottom_right' },
      { id: 'alerts', corner: 'top_left' },
    ])

    expect(layout.containerFor('bottom_right')).toBe('toast-group')
    expect(layout.containerFor('top_left')).toBe('alerts')
    expect(layout.containerFor('top_right')).toBeUndefined()
  })

  it('lists records per corner and leaves unplaced groups out', () => {
    const store = createToastStore()
    const layout = createCornerLayout(store, [
      { id: 'toast-group', corner: 'bottom_right' },
      { id: 'alerts', corner: 'top_left' },
    ])
    const { toastStore } = store.getState()
    toastStore.upsert({ id: 'a', message: 'Saved' })
    toastStore.upsert({ id: 'b', message: 'Disk almost full', kind: 'error', group: 'alerts' })
    toastStore.upsert({ id: 'c', message: 'Nowhere', group: 'sidebar' })

    const snapshot = layout.snapshot()

    expect(snapshot.bottom_right.map((toast) => toast.id)).toEqual(['a'])
    expect(snapshot.top_left.map((toast) => toast.id)).toEqual(['b'])
    expect(snapshot.top_right).toEqual([])
    expect(snapshot.bottom_left).toEqual([])
    expect(layout.list('top_right')).toEqual([])
  })

  it('notifies a corner subscriber only when that corner changes', () => {
    const store = createToastStore()
    const layout = createCornerLayout(store, [
      { id: 'toast-group', corner: 'bottom_right' },
      { id: 'alerts', corner: 'top_left' },
    ])
    const listener = vi.fn()
    const unsubscribe = layout.subscribe('top_left', listener)
    const { toastStore } = store.getState()

    toastStore.upsert({ id: 'a', message: 'Saved' })
    expect(listener).not.toHaveBeenCalled()

    toastStore.upsert({ id: 'b', message: 'Heads up', group: 'alerts' })
    expect(listener).toHaveBeenCalledTimes(1)

    unsubscribe()
    toastStore.remove('b')
    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('rejects two containers in the same corner', () => {
    const store = createToastStore()

    expect(() =>
      createCornerLayout(store, [
        { id: 'one', corner: 'top_left' },
        { id: 'two', corner: 'top_left' },
      ]),
    ).toThrow(ToastConfigError)
  })

  it('rejects duplicate container ids', () => {
    const store = createToastStore()

    try {
      createCornerLayout(store, [
        { id: 'same', corner: 'top_left' },
        { id: 'same', corner: 'top_right' },
      ])
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ToastConfigError)
      if (error instanceof ToastConfigError) {
        expect(error.details?.issues).toEqual(['1.id: Duplicate container id same'])
      }
    }
  })
})

import { describe, it, expect } from 'vitest'
import { ToastConfigError } from '@/src/notifications/errors'
import { loadToastConfig, readToastEnv, resolveToastConfig } from './toast-config'

describe('resolveToastConfig', () => {
  it('fills in defaults', () => {
    expect(resolveToastConfig()).toEqual({
      groupId: 'toast-group',
      corner: 'bottom_right',
      defaultDurationMs: 6000,
      kinds: ['info', 'error'],
      showClientAndServerFlashes: true,
    })
  })

  it('rejects an empty kind list', () => {
    try {
      resolveToastConfig({ kinds: [] })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ToastConfigError)
      if (error instanceof ToastConfigError) {
        expect(error.code).toBe('INVALID_CONFIG')
        expect(error.details?.issues).toEqual(['kinds: At least one kind is required'])
      }
    }
  })
})

describe('loadToastConfig', () => {
  it('reads every setting from the environment', () => {
    const config = loadToastConfig({
      TOAST_GROUP_ID: 'flash-group',
      TOAST_CORNER: 'top_left',
      TOAST_DEFAULT_DURATION_MS: '2500',
      TOAST_KINDS: 'info, warning ,error,',
      TOAST_SHOW_CLIENT_AND_SERVER_FLASHES: 'off',
    })

    expect(config).toEqual({
      groupId: 'flash-group',
      corner: 'top_left',
      defaultDurationMs: 2500,
      kinds: ['info', 'warning', 'error'],
      showClientAndServerFlashes: false,
    })
  })

  it('lets overrides win over the environment', () => {
    const config = loadToastConfig({ TOAST_CORNER: 'top_left' }, { corner: 'bottom_left' })

    expect(config.corner).toBe('bottom_left')
  })

  it('keeps environment values when an override is undefined', () => {
    const config = loadToastConfig({ TOAST_CORNER: 'top_left' }, { corner: undefined, groupId: 'sidebar' })

    expect(config.corner).toBe('top_left')
    expect(config.groupId).toBe('sidebar')
  })

  it('rejects a default duration longer than a timer can wait', () => {
    try {
      loadToastConfig({ TOAST_DEFAULT_DURATION_MS: '3000000000' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ToastConfigError)
      if (error instanceof ToastConfigError) {
        expect(error.details?.issues).toEqual(['defaultDurationMs: Default duration must not exceed 2147483647 ms'])
      }
    }
  })

  it('ignores blank variables', () => {
    expect(readToastEnv({ TOAST_CORNER: '  ', TOAST_KINDS: '' })).toEqual({})
  })

  it('rejects an unknown corner', () => {
    expect(() => loadToastConfig({ TOAST_CORNER: 'middle' })).toThrow(ToastConfigError)
  })

  it('rejects a malformed boolean', () => {
    expect(() => loadToastConfig({ TOAST_SHOW_CLIENT_AND_SERVER_FLASHES: 'sometimes' })).toThrow(
      'TOAST_SHOW_CLIENT_AND_SERVER_FLASHES must be a boolean (true/false), received: sometimes',
    )
  })

  it('rejects a non-numeric duration', () => {
    expect(() => loadToastConfig({ TOAST_DEFAULT_DURATION_MS: 'soon' })).toThrow(ToastConfigError)
  })
})

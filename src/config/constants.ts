export const CORNERS = ['top_left', 'top_right', 'bottom_left', 'bottom_right'] as const

export type Corner = (typeof CORNERS)[number]

export const DEFAULT_GROUP_ID = 'toast-group'

export const DEFAULT_CORNER: Corner = 'bottom_right'

export const DEFAULT_KINDS = ['info', 'error'] as const

export const DEFAULT_KIND = 'info'

export const DEFAULT_DURATION_MS = 6000

// Largest delay setTimeout honours; anything above fires after 1 ms
export const MAX_DURATION_MS = 2_147_483_647

// Flashes a live surface raises while it is disconnected from, or rejected by, the server
export const CONNECTION_FLASH_KINDS = ['client-error', 'server-error'] as const

export const FLASH_ID_PREFIX = 'flash-'

export enum DismissReason {
  DISMISSED = 'dismissed',
  EXPIRED = 'expired',
  FLASH_CLEARED = 'flash_cleared',
  CLEARED = 'cleared',
}

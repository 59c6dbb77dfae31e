import type { ZodError } from 'zod'

export type ToastErrorCode = 'INVALID_NOTIFICATION' | 'INVALID_CONFIG'

export interface ToastErrorDetails {
  issues?: string[]
  [key: string]: unknown
}

/**
 * Error types
 */
export class ToastError extends Error {
  constructor(
    message: string,
    public code: ToastErrorCode,
    public details?: ToastErrorDetails,
  ) {
    super(message)
    this.name = 'ToastError'
  }
}

export class InvalidNotificationError extends ToastError {
  constructor(message: string, details?: ToastErrorDetails) {
    super(message, 'INVALID_NOTIFICATION', details)
    this.name = 'InvalidNotificationError'
  }
}

export class ToastConfigError extends ToastError {
  constructor(message: string, details?: ToastErrorDetails) {
    super(message, 'INVALID_CONFIG', details)
    this.name = 'ToastConfigError'
  }
}

// Flattens zod issues into "path: message" lines, e.g. "message: Message is required"
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

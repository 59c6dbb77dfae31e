import { z } from 'zod'
import { MAX_DURATION_MS } from '@/src/config/constants'
import type { RenderFn } from '@/src/notifications/types'

// z.function() would wrap the callback; render refs must pass through by reference
const DurationSchema = z
  .number()
  .int('Duration must be a whole number of milliseconds')
  .nonnegative()
  .max(MAX_DURATION_MS, `Duration must not exceed ${MAX_DURATION_MS} ms`)

const RenderFnSchema = z.custom<RenderFn>((value) => typeof value === 'function', {
  message: 'Render callback must be a function',
})

export const ToastRenderersSchema = z.object({
  icon: RenderFnSchema.optional(),
  action: RenderFnSchema.optional(),
  component: RenderFnSchema.optional(),
})

export const NotificationSourceSchema = z.enum(['client', 'flash'])

export const NotificationInputSchema = z.object({
  id: z.string().min(1, 'Id must not be empty').optional(),
  kind: z.string().min(1, 'Kind must not be empty').optional(),
  message: z.string().min(1, 'Message is required').optional(),
  title: z.string().nullish(),
  renderers: ToastRenderersSchema.nullish(),
  durationMs: DurationSchema.nullish(),
  group: z.string().min(1, 'Group must not be empty').optional(),
  source: NotificationSourceSchema.optional(),
  bringToFront: z.boolean().optional(),
})

export const EmitInputSchema = z.object({
  kind: z.string().min(1, 'Kind is required'),
  message: z.string().min(1, 'Message is required'),
  options: z
    .object({
      id: z.string().min(1).optional(),
      title: z.string().optional(),
      icon: RenderFnSchema.optional(),
      action: RenderFnSchema.optional(),
      component: RenderFnSchema.optional(),
      durationMs: DurationSchema.optional(),
      group: z.string().min(1).optional(),
      container: z.string().min(1).optional(),
      bringToFront: z.boolean().optional(),
    })
    .default({}),
})

export type NotificationInputType = z.infer<typeof NotificationInputSchema>
export type EmitInputType = z.infer<typeof EmitInputSchema>

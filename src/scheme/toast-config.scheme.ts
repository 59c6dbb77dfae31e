import { z } from 'zod'
import {
  CORNERS,
  DEFAULT_CORNER,
  DEFAULT_DURATION_MS,
  DEFAULT_GROUP_ID,
  DEFAULT_KINDS,
  MAX_DURATION_MS,
} from '@/src/config/constants'

export const CornerSchema = z.enum(CORNERS)

export const ToastConfigSchema = z.object({
  groupId: z.string().min(1, 'Group id must not be empty').default(DEFAULT_GROUP_ID),
  corner: CornerSchema.default(DEFAULT_CORNER),
  defaultDurationMs: z
    .number()
    .int('Default duration must be a whole number of milliseconds')
    .nonnegative('Default duration must not be negative')
    .max(MAX_DURATION_MS, `Default duration must not exceed ${MAX_DURATION_MS} ms`)
    .default(DEFAULT_DURATION_MS),
  kinds: z
    .array(z.string().min(1, 'Kinds must not be empty strings'))
    .min(1, 'At least one kind is required')
    .default([...DEFAULT_KINDS]),
  showClientAndServerFlashes: z.boolean().default(true),
})

export const CornerContainersSchema = z
  .array(
    z.object({
      id: z.string().min(1, 'Container id must not be empty'),
      corner: CornerSchema,
    }),
  )
  .max(CORNERS.length, `At most ${CORNERS.length} containers are supported`)
  .superRefine((containers, ctx) => {
    const seenIds = new Set<string>()
    const seenCorners = new Set<string>()
    containers.forEach((container, index) => {
      if (seenIds.has(container.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate container id ${container.id}` })
      }
      if (seenCorners.has(container.corner)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'corner'],
          message: `Corner ${container.corner} already has a container`,
        })
      }
      seenIds.add(container.id)
      seenCorners.add(container.corner)
    })
  })

export type ToastConfig = z.infer<typeof ToastConfigSchema>
export type ToastConfigInput = z.input<typeof ToastConfigSchema>
export type CornerContainer = z.infer<typeof CornerContainersSchema>[number]

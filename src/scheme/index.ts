export {
  NotificationInputSchema,
  NotificationSourceSchema,
  ToastRenderersSchema,
  EmitInputSchema,
} from './notification.scheme'
export type { NotificationInputType, EmitInputType } from './notification.scheme'
export { ToastConfigSchema, CornerSchema, CornerContainersSchema } from './toast-config.scheme'
export type { ToastConfig, ToastConfigInput, CornerContainer } from './toast-config.scheme'

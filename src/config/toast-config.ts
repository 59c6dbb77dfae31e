import { ToastConfigSchema, type ToastConfig, type ToastConfigInput } from '@/src/scheme'
import { ToastConfigError, formatIssues } from '@/src/notifications/errors'
import { structuredLogger } from '@/src/observability'
import { getOptionalEnvVar, parseEnvBool, type EnvRecord } from '@/src/utils/env'

export const TOAST_ENV_KEYS = {
  GROUP_ID: 'TOAST_GROUP_ID',
  CORNER: 'TOAST_CORNER',
  DEFAULT_DURATION_MS: 'TOAST_DEFAULT_DURATION_MS',
  KINDS: 'TOAST_KINDS',
  SHOW_CLIENT_AND_SERVER_FLASHES: 'TOAST_SHOW_CLIENT_AND_SERVER_FLASHES',
} as const

/**
 * Validate a toast configuration and fill in defaults.
 * Throws ToastConfigError with one "path: message" line per problem.
 */
export function resolveToastConfig(input: ToastConfigInput = {}): ToastConfig {
  return parseToastConfig(input)
}

function parseToastConfig(input: unknown): ToastConfig {
  const result = ToastConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = formatIssues(result.error)
    structuredLogger.warn('Rejected toast configuration', { issues: issues.join('; ') })
    throw new ToastConfigError('Invalid toast configuration', { issues })
  }
  return result.data
}

function readDuration(raw: string): number {
  const parsed = Number(raw)
  if (raw === '' || Number.isNaN(parsed)) {
    throw new ToastConfigError(`${TOAST_ENV_KEYS.DEFAULT_DURATION_MS} must be a number, received: ${raw}`)
  }
  return parsed
}

function readBoolean(raw: string): boolean {
  const parsed = parseEnvBool(raw)
  if (parsed === null) {
    throw new ToastConfigError(
      `${TOAST_ENV_KEYS.SHOW_CLIENT_AND_SERVER_FLASHES} must be a boolean (true/false), received: ${raw}`,
    )
  }
  return parsed
}

function readKinds(raw: string): string[] {
  return raw
    .split(',')
    .map((kind) => kind.trim())
    .filter(Boolean)
}

// Raw values; the schema checks them (e.g. corner against the enum)
export type ToastEnvValues = { [K in keyof ToastConfig]?: unknown }

// Values the environment does not set are left out so schema defaults apply
export function readToastEnv(env: EnvRecord): ToastEnvValues {
  const fromEnv: ToastEnvValues = {}

  const groupId = getOptionalEnvVar(env, TOAST_ENV_KEYS.GROUP_ID)
  if (groupId !== undefined) fromEnv.groupId = groupId

  const corner = getOptionalEnvVar(env, TOAST_ENV_KEYS.CORNER)
  if (corner !== undefined) fromEnv.corner = corner

  const duration = getOptionalEnvVar(env, TOAST_ENV_KEYS.DEFAULT_DURATION_MS)
  if (duration !== undefined) fromEnv.defaultDurationMs = readDuration(duration)

  const kinds = getOptionalEnvVar(env, TOAST_ENV_KEYS.KINDS)
  if (kinds !== undefined) fromEnv.kinds = readKinds(kinds)

  const showFlashes = getOptionalEnvVar(env, TOAST_ENV_KEYS.SHOW_CLIENT_AND_SERVER_FLASHES)
  if (showFlashes !== undefined) fromEnv.showClientAndServerFlashes = readBoolean(showFlashes)

  return fromEnv
}

/**
 * Load toast configuration from environment variables.
 * Explicit overrides take priority over the environment; undefined overrides are ignored.
 */
export function loadToastConfig(env: EnvRecord = process.env, overrides: ToastConfigInput = {}): ToastConfig {
  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
  return parseToastConfig({ ...readToastEnv(env), ...explicit })
}

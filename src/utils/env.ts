// Environment variable priority order:
// 1. Explicit env record passed by the caller (tests, embedding hosts)
// 2. process.env
// 3. Default values - fallback

export type EnvRecord = Record<string, string | undefined>

// Helper function to get a specific environment variable with proper priority
export const getEnvVar = (env: EnvRecord, key: string, defaultValue: string = ''): string => {
  // Check for undefined specifically, not falsy values
  const value = env[key]
  if (value === undefined || value.trim() === '') {
    return defaultValue
  }
  return value.trim()
}

// Returns undefined for unset or blank variables so callers can fall back to schema defaults
export const getOptionalEnvVar = (env: EnvRecord, key: string): string | undefined => {
  const value = env[key]
  if (value === undefined || value.trim() === '') return undefined
  return value.trim()
}

const TRUE_VALUES = ['true', '1', 'yes', 'on']
const FALSE_VALUES = ['false', '0', 'no', 'off']

// Parses a boolean flag; null means the value was set but is not a recognised boolean
export const parseEnvBool = (value: string): boolean | null => {
  const normalized = value.trim().toLowerCase()
  if (TRUE_VALUES.includes(normalized)) return true
  if (FALSE_VALUES.includes(normalized)) return false
  return null
}

// Helper function to get boolean environment variables
export const getEnvBool = (env: EnvRecord, key: string, defaultValue: boolean = false): boolean => {
  const raw = getOptionalEnvVar(env, key)
  if (raw === undefined) return defaultValue
  return parseEnvBool(raw) ?? defaultValue
}

/**
 * Observability configuration for toast-corner
 * Follows the OpenTelemetry environment variable conventions
 */

import { ToastConfigError } from '@/src/notifications/errors'
import { getEnvBool, getEnvVar, getOptionalEnvVar, type EnvRecord } from '@/src/utils/env'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface ObservabilityConfig {
  // Logging configuration
  logLevel: LogLevel
  consoleLogsEnabled: boolean

  // OpenTelemetry configuration
  logsEnabled: boolean
  metricsEnabled: boolean
  serviceName: string
  serviceVersion: string
  serviceNamespace: string
  serviceInstanceId: string

  // OTLP Exporter configuration
  otlpEndpoint: string
  otlpHeaders?: Record<string, string>
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

function parseHeaders(raw: string | undefined): Record<string, string> | undefined {
  if (!raw) return undefined

  const invalid = () => new ToastConfigError('OTEL_EXPORTER_OTLP_HEADERS must be a JSON object of header values')

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw invalid()
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) throw invalid()

  const headers: Record<string, string> = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') headers[key] = value
  }
  return headers
}

/**
 * Load observability configuration from environment variables
 */
export function loadObservabilityConfig(env: EnvRecord = process.env): ObservabilityConfig {
  const level = getEnvVar(env, 'LOG_LEVEL', 'info').toLowerCase()

  return {
    logLevel: isLogLevel(level) ? level : 'info',
    consoleLogsEnabled: getEnvBool(env, 'CONSOLE_LOGS_ENABLED', false),
    logsEnabled: getEnvBool(env, 'OTEL_LOGS_ENABLED', false),
    metricsEnabled: getEnvBool(env, 'OTEL_METRICS_ENABLED', false),
    serviceName: getEnvVar(env, 'OTEL_SERVICE_NAME', 'toast-corner'),
    serviceVersion: getEnvVar(env, 'OTEL_SERVICE_VERSION', 'dev'),
    serviceNamespace: getEnvVar(env, 'OTEL_SERVICE_NAMESPACE'),
    serviceInstanceId: getEnvVar(env, 'OTEL_SERVICE_INSTANCE_ID'),
    otlpEndpoint: getEnvVar(env, 'OTEL_EXPORTER_OTLP_ENDPOINT', 'http://localhost:4318'),
    otlpHeaders: parseHeaders(getOptionalEnvVar(env, 'OTEL_EXPORTER_OTLP_HEADERS')),
  }
}

/**
 * Default configuration instance
 */
export const observabilityConfig = loadObservabilityConfig()

/**
 * Observability module for toast-corner
 * Provides OpenTelemetry logging and metrics
 */

import { configureLogger, shutdownLogger } from './logger'
import { configureMetrics, shutdownMetrics } from './metrics'
import { observabilityConfig, type ObservabilityConfig } from './config'

export { configureLogger, flushLogger, structuredLogger, shutdownLogger } from './logger'
export { configureMetrics, metricsRecorder, isMetricsConfigured, shutdownMetrics, TOAST_METRIC_PREFIX } from './metrics'
export { buildServiceResource } from './resource'
export { loadObservabilityConfig, observabilityConfig } from './config'
export type { ObservabilityConfig, LogLevel } from './config'
export type { LogAttributes } from './logger'

/**
 * Initialize observability (logs and metrics)
 * Call this once when the host process starts
 */
export function initializeObservability(config: ObservabilityConfig = observabilityConfig) {
  configureLogger(config)
  configureMetrics(config)
}

/**
 * Shutdown observability and flush all pending data
 */
export async function shutdownObservability(): Promise<void> {
  await Promise.all([shutdownLogger(), shutdownMetrics()])
}

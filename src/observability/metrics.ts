/**
 * Toast counters on an OpenTelemetry MeterProvider
 */

import { metrics, ValueType, type Counter } from '@opentelemetry/api'
import { MeterProvider, PeriodicExportingMetricReader, type MetricReader } from '@opentelemetry/sdk-metrics'
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http'
import type { ObservabilityConfig } from './config'
import { buildServiceResource } from './resource'

export const TOAST_METRIC_PREFIX = 'toast_corner'

interface ToastCounters {
  provider: MeterProvider
  emitted: Counter
  removed: Counter
}

let counters: ToastCounters | null = null

function otlpMetricReader(config: ObservabilityConfig): MetricReader {
  return new PeriodicExportingMetricReader({
    exporter: new OTLPMetricExporter({ url: `${config.otlpEndpoint}/v1/metrics`, headers: config.otlpHeaders }),
    exportIntervalMillis: 10000,
  })
}

/**
 * Start recording toast counters. The reader defaults to periodic OTLP export over HTTP.
 */
export function configureMetrics(config: ObservabilityConfig, reader?: MetricReader): void {
  if (!config.metricsEnabled || counters) return

  const provider = new MeterProvider({
    resource: buildServiceResource(config),
    readers: [reader ?? otlpMetricReader(config)],
  })
  metrics.setGlobalMeterProvider(provider)

  const meter = provider.getMeter(config.serviceName, config.serviceVersion)
  counters = {
    provider,
    emitted: meter.createCounter(`${TOAST_METRIC_PREFIX}_toasts_emitted_total`, {
      description: 'Notifications inserted into a toast store',
      valueType: ValueType.INT,
    }),
    removed: meter.createCounter(`${TOAST_METRIC_PREFIX}_toasts_removed_total`, {
      description: 'Notifications removed from a toast store',
      valueType: ValueType.INT,
    }),
  }
}

export function isMetricsConfigured(): boolean {
  return counters !== null
}

// No-ops until configureMetrics() has run
export const metricsRecorder = {
  recordToastEmitted: (kind: string, group: string, source: string) => {
    counters?.emitted.add(1, { kind, group, source })
  },

  recordToastRemoved: (reason: string) => {
    counters?.removed.add(1, { reason })
  },
}

export async function shutdownMetrics(): Promise<void> {
  if (!counters) return
  const { provider } = counters
  counters = null
  await provider.shutdown()
}

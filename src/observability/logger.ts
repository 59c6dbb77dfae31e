/**
 * Structured logger backed by an OpenTelemetry LoggerProvider
 */

import { logs, SeverityNumber, type Logger } from '@opentelemetry/api-logs'
import {
  BatchLogRecordProcessor,
  ConsoleLogRecordExporter,
  LoggerProvider,
  type LogRecordExporter,
} from '@opentelemetry/sdk-logs'
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-http'
import { observabilityConfig, type LogLevel, type ObservabilityConfig } from './config'
import { buildServiceResource } from './resource'

export interface LogAttributes {
  [key: string]: string | number | boolean | undefined
}

interface LoggerState {
  provider: LoggerProvider
  logger: Logger
}

let state: LoggerState | null = null
let consoleConfig: Pick<ObservabilityConfig, 'logLevel' | 'consoleLogsEnabled'> = observabilityConfig

const LEVELS: Record<LogLevel, { rank: number; severity: SeverityNumber; print: (...data: unknown[]) => void }> = {
  debug: { rank: 0, severity: SeverityNumber.DEBUG, print: (...data) => console.debug(...data) },
  info: { rank: 1, severity: SeverityNumber.INFO, print: (...data) => console.info(...data) },
  warn: { rank: 2, severity: SeverityNumber.WARN, print: (...data) => console.warn(...data) },
  error: { rank: 3, severity: SeverityNumber.ERROR, print: (...data) => console.error(...data) },
}

function otlpLogExporter(config: ObservabilityConfig): LogRecordExporter {
  return new OTLPLogExporter({ url: `${config.otlpEndpoint}/v1/logs`, headers: config.otlpHeaders })
}

/**
 * Start exporting log records. The exporter defaults to OTLP over HTTP.
 */
export function configureLogger(config: ObservabilityConfig, exporter?: LogRecordExporter): void {
  consoleConfig = config
  if (!config.logsEnabled || state) return

  const provider = new LoggerProvider({ resource: buildServiceResource(config) })
  provider.addLogRecordProcessor(
    new BatchLogRecordProcessor(exporter ?? otlpLogExporter(config), {
      maxQueueSize: 100,
      maxExportBatchSize: 10,
      scheduledDelayMillis: 1000,
    }),
  )
  if (config.logLevel === 'debug' && config.consoleLogsEnabled) {
    provider.addLogRecordProcessor(new BatchLogRecordProcessor(new ConsoleLogRecordExporter()))
  }

  // Registers for third-party code; our own records go through the provider directly
  logs.setGlobalLoggerProvider(provider)
  state = { provider, logger: provider.getLogger(config.serviceName, config.serviceVersion) }
}

function log(level: LogLevel, message: string, attributes: LogAttributes = {}) {
  const { rank, severity, print } = LEVELS[level]

  state?.logger.emit({
    severityNumber: severity,
    severityText: level.toUpperCase(),
    body: message,
    attributes,
    timestamp: Date.now(),
  })

  if (consoleConfig.consoleLogsEnabled && rank >= LEVELS[consoleConfig.logLevel].rank) {
    print(`[${level.toUpperCase()}] ${message}`, attributes)
  }
}

export const structuredLogger = {
  debug: (message: string, attributes?: LogAttributes) => log('debug', message, attributes),
  info: (message: string, attributes?: LogAttributes) => log('info', message, attributes),
  warn: (message: string, attributes?: LogAttributes) => log('warn', message, attributes),
  error: (message: string, attributes?: LogAttributes) => log('error', message, attributes),

  // Child logger whose attributes are merged under each call's own
  with: (context: LogAttributes) => ({
    debug: (message: string, attributes?: LogAttributes) => log('debug', message, { ...context, ...attributes }),
    info: (message: string, attributes?: LogAttributes) => log('info', message, { ...context, ...attributes }),
    warn: (message: string, attributes?: LogAttributes) => log('warn', message, { ...context, ...attributes }),
    error: (message: string, attributes?: LogAttributes) => log('error', message, { ...context, ...attributes }),
  }),
}

export async function flushLogger(): Promise<void> {
  await state?.provider.forceFlush()
}

/**
 * Flush pending records and stop exporting
 */
export async function shutdownLogger(): Promise<void> {
  if (!state) return
  const { provider } = state
  state = null
  await provider.shutdown()
}

import { Resource } from '@opentelemetry/resources'
import {
  SEMRESATTRS_SERVICE_INSTANCE_ID,
  SEMRESATTRS_SERVICE_NAME,
  SEMRESATTRS_SERVICE_NAMESPACE,
  SEMRESATTRS_SERVICE_VERSION,
} from '@opentelemetry/semantic-conventions'
import type { ObservabilityConfig } from './config'

// Service identity shared by the logger and meter providers; unset optional attributes are omitted
export function buildServiceResource(config: ObservabilityConfig): Resource {
  const optional = Object.entries({
    [SEMRESATTRS_SERVICE_NAMESPACE]: config.serviceNamespace,
    [SEMRESATTRS_SERVICE_INSTANCE_ID]: config.serviceInstanceId,
  }).filter(([, value]) => value !== '')

  return new Resource({
    [SEMRESATTRS_SERVICE_NAME]: config.serviceName,
    [SEMRESATTRS_SERVICE_VERSION]: config.serviceVersion,
    ...Object.fromEntries(optional),
  })
}

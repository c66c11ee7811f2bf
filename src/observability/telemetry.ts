import { logs, SeverityNumber } from '@opentelemetry/api-logs';
import { metrics } from '@opentelemetry/api';
import { createLogger } from './logger';

/**
 * OpenTelemetry wiring.
 *
 * Events go out through the global OTEL logger provider and metrics through
 * the global meter provider. Without an SDK registered by the host process
 * both are no-ops, so this module only decides whether to emit at all.
 */

const log = createLogger('Telemetry');

export const TELEMETRY_SCOPE = 'sandbox-agent';

export function isTelemetryEnabled(): boolean {
  return process.env.SANDBOX_AGENT_ENABLE_TELEMETRY === '1';
}

export function initTelemetry(): void {
  if (!isTelemetryEnabled()) {
    log.debug('Disabled (set SANDBOX_AGENT_ENABLE_TELEMETRY=1 to enable)');
    return;
  }

  log.info('Enabled');
  if (process.env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    log.info(`OTLP endpoint: ${process.env.OTEL_EXPORTER_OTLP_ENDPOINT}`);
  }
}

export function getEventLogger() {
  return logs.getLogger(TELEMETRY_SCOPE);
}

export function getMeter() {
  return metrics.getMeter(TELEMETRY_SCOPE);
}

/**
 * Emit a structured event. Falls back to a debug line when the OTEL logger
 * rejects the record.
 */
export function emitEvent(
  eventName: string,
  attributes: Record<string, string | number | boolean>
): void {
  if (!isTelemetryEnabled()) {
    return;
  }

  const timestamp = new Date().toISOString();
  try {
    getEventLogger().emit({
      severityNumber: SeverityNumber.INFO,
      severityText: 'INFO',
      body: eventName,
      attributes: {
        'event.name': eventName,
        'event.timestamp': timestamp,
        ...attributes,
      },
    });
  } catch (error) {
    log.debug(`${eventName}`, JSON.stringify({ timestamp, ...attributes }), error);
  }
}

/**
 * Observability: tagged console logging, OpenTelemetry events and metrics,
 * and optional Langfuse traces.
 */

export { createLogger, isDebugEnabled } from './logger';
export type { Logger } from './logger';

export { initTelemetry, isTelemetryEnabled, emitEvent } from './telemetry';

export {
  emitSessionStart,
  emitSessionEnd,
  emitApiRequest,
  emitApiError,
  emitToolUse,
  emitApproval,
} from './events';

export {
  initMetrics,
  recordSession,
  recordTokens,
  recordToolUse,
  recordApproval,
  recordApiDuration,
} from './metrics';

export {
  isLangfuseEnabled,
  createTrace,
  createGeneration,
  createSpan,
  flushLangfuse,
  shutdownLangfuse,
} from './langfuse';
export type { LangfuseTrace } from './langfuse';

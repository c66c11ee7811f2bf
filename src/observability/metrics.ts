import type { Counter, Histogram } from '@opentelemetry/api';
import { getMeter, isTelemetryEnabled } from './telemetry';

let sessionCounter: Counter | null = null;
let tokenCounter: Counter | null = null;
let toolCounter: Counter | null = null;
let approvalCounter: Counter | null = null;

let apiDurationHistogram: Histogram | null = null;
let toolDurationHistogram: Histogram | null = null;

/**
 * Create the metric instruments. Call after telemetry is initialized;
 * until then every record* call is a no-op.
 */
export function initMetrics(): void {
  if (!isTelemetryEnabled()) {
    return;
  }

  const meter = getMeter();

  sessionCounter = meter.createCounter('sandbox_agent.session.count', {
    description: 'Count of user messages handled',
    unit: 'count',
  });
  tokenCounter = meter.createCounter('sandbox_agent.token.usage', {
    description: 'Number of tokens used',
    unit: 'tokens',
  });
  toolCounter = meter.createCounter('sandbox_agent.tool.count', {
    description: 'Count of tool executions',
    unit: 'count',
  });
  approvalCounter = meter.createCounter('sandbox_agent.approval.count', {
    description: 'Count of approval decisions',
    unit: 'count',
  });
  apiDurationHistogram = meter.createHistogram('sandbox_agent.api.duration', {
    description: 'Model request duration in milliseconds',
    unit: 'ms',
  });
  toolDurationHistogram = meter.createHistogram('sandbox_agent.tool.duration', {
    description: 'Tool execution duration in milliseconds',
    unit: 'ms',
  });
}

export function recordSession(attributes: { model: string }): void {
  sessionCounter?.add(1, { model: attributes.model });
}

export function recordTokens(
  type: 'input' | 'output',
  count: number,
  attributes: { model: string }
): void {
  tokenCounter?.add(count, { type, model: attributes.model });
}

export function recordToolUse(attributes: {
  toolName: string;
  success: boolean;
  durationMs: number;
}): void {
  toolCounter?.add(1, {
    tool_name: attributes.toolName,
    success: String(attributes.success),
  });
  toolDurationHistogram?.record(attributes.durationMs, {
    tool_name: attributes.toolName,
  });
}

export function recordApproval(attributes: {
  toolName: string;
  decision: 'granted' | 'denied' | 'timeout';
}): void {
  approvalCounter?.add(1, {
    tool_name: attributes.toolName,
    decision: attributes.decision,
  });
}

export function recordApiDuration(durationMs: number, attributes: { model: string }): void {
  apiDurationHistogram?.record(durationMs, { model: attributes.model });
}

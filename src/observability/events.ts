import { emitEvent } from './telemetry';

export function emitSessionStart(params: {
  sessionId: string;
  model: string;
  thinkingLevel: string;
  messageLength: number;
}): void {
  emitEvent('sandbox_agent.session_start', {
    'session.id': params.sessionId,
    model: params.model,
    thinking_level: params.thinkingLevel,
    message_length: params.messageLength,
  });
}

/**
 * Emit for each model API request
 */
export function emitApiRequest(params: {
  sessionId: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
}): void {
  emitEvent('sandbox_agent.api_request', {
    'session.id': params.sessionId,
    model: params.model,
    input_tokens: params.inputTokens,
    output_tokens: params.outputTokens,
    duration_ms: params.durationMs,
  });
}

export function emitApiError(params: {
  sessionId: string;
  model: string;
  error: string;
  durationMs: number;
}): void {
  emitEvent('sandbox_agent.api_error', {
    'session.id': params.sessionId,
    model: params.model,
    error: params.error,
    duration_ms: params.durationMs,
  });
}

export function emitToolUse(params: {
  sessionId: string;
  toolName: string;
  success: boolean;
  durationMs: number;
  errorKind?: string;
}): void {
  emitEvent('sandbox_agent.tool_use', {
    'session.id': params.sessionId,
    tool_name: params.toolName,
    success: params.success,
    duration_ms: params.durationMs,
    ...(params.errorKind ? { error_kind: params.errorKind } : {}),
  });
}

/**
 * Emit when the approval gate settles
 */
export function emitApproval(params: {
  toolName: string;
  decision: 'granted' | 'denied' | 'timeout';
  waitMs: number;
}): void {
  emitEvent('sandbox_agent.approval', {
    tool_name: params.toolName,
    decision: params.decision,
    wait_ms: params.waitMs,
  });
}

export function emitSessionEnd(params: {
  sessionId: string;
  status: 'completed' | 'failed' | 'cancelled';
  totalTurns: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalDurationMs: number;
  error?: string;
}): void {
  emitEvent('sandbox_agent.session_end', {
    'session.id': params.sessionId,
    status: params.status,
    total_turns: params.totalTurns,
    total_input_tokens: params.totalInputTokens,
    total_output_tokens: params.totalOutputTokens,
    total_duration_ms: params.totalDurationMs,
    ...(params.error ? { error: params.error } : {}),
  });
}

import { ThinkingTrace, Turn } from './transcript';
import { ToolInvocationRequest, ToolSpec } from './tool';

export const THINKING_LEVELS = ['LOW', 'HIGH', 'AUTO'] as const;

export type ThinkingLevel = (typeof THINKING_LEVELS)[number];

export type AgentState =
  | 'Idle'
  | 'AwaitingModel'
  | 'AwaitingApproval'
  | 'ExecutingTool'
  | 'Done'
  | 'Failed';

export interface ModelRequest {
  transcript: readonly Turn[];
  toolSpecs: readonly ToolSpec[];
  thinkingLevel: ThinkingLevel;
}

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelTextResponse {
  kind: 'text';
  text: string;
  usage?: ModelUsage;
}

export interface ModelToolCallResponse extends ToolInvocationRequest {
  kind: 'tool_call';
  id: string;
  /** Text the model emitted alongside the call */
  preamble?: string;
  thinking?: ThinkingTrace[];
  usage?: ModelUsage;
}

export type ModelResponse = ModelTextResponse | ModelToolCallResponse;

/** How one user message ended */
export interface ExchangeResult {
  status: 'completed' | 'failed' | 'cancelled';
  /** Final assistant text, when completed */
  text?: string;
  error?: string;
}

/**
 * The terminal (or any other front end) as seen from the agent loop
 */
export interface Presenter {
  displayTurn(turn: Turn): void;
  displayApprovalPrompt(
    toolName: string,
    args: Record<string, unknown>,
    signal: AbortSignal
  ): Promise<boolean>;
  displayError(message: string): void;
  displayStatus?(state: AgentState): void;
}

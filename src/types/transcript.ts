import { ToolErrorKind } from './tool';

/**
 * Opaque reasoning the model attached to a tool call. It is replayed
 * verbatim with the assistant message that carried it.
 */
export type ThinkingTrace =
  | { type: 'thinking'; thinking: string; signature: string }
  | { type: 'redacted_thinking'; data: string };

export interface UserMessageTurn {
  type: 'user_message';
  text: string;
}

export interface AssistantTextTurn {
  type: 'assistant_text';
  text: string;
}

export interface ToolRequestTurn {
  type: 'tool_request';
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  thinking?: ThinkingTrace[];
}

export interface ToolResultTurn {
  type: 'tool_result';
  id: string;
  name: string;
  output: string;
  ok: boolean;
  errorKind?: ToolErrorKind;
}

export type Turn =
  | UserMessageTurn
  | AssistantTextTurn
  | ToolRequestTurn
  | ToolResultTurn;

import { ThinkingLevel } from './agent';

export interface AgentConfig {
  /** Absolute path of the sandbox root */
  workspace: string;
  model: string;
  maxTokens: number;
  thinkingLevel: ThinkingLevel;
  shellTimeoutMs: number;
  /** Undefined means the approval prompt waits indefinitely */
  approvalTimeoutMs?: number;
  /** Maximum characters of tool output kept in the transcript */
  outputLimit: number;
  maxToolRounds: number;
  maxRetries: number;
}

import Anthropic from '@anthropic-ai/sdk';
import { ModelResponse, ThinkingLevel, ThinkingTrace, ToolSpec, Turn } from '../types';
import { isRecord } from '../config/validate-config';

type MessageParam = Anthropic.Messages.MessageParam;
type ContentBlockParam = Anthropic.Messages.ContentBlockParam;

/** Smallest thinking budget the Messages API accepts */
export const MIN_THINKING_BUDGET = 1024;

/**
 * The parts of a Messages API reply the agent reads. Structural, so SDK
 * block types this client does not handle pass through unexamined.
 */
export interface ReplyBlock {
  type: string;
  text?: string;
  thinking?: string;
  signature?: string;
  data?: string;
  id?: string;
  name?: string;
  input?: unknown;
}

export interface AssistantReply {
  content: readonly ReplyBlock[];
  usage: { input_tokens: number; output_tokens: number };
  stop_reason?: string | null;
}

const EMPTY_TEXT = '(no response)';
const EMPTY_OUTPUT = '(no output)';

/**
 * Replay the transcript as Messages API turns.
 *
 * Assistant text and tool requests that follow each other share one
 * assistant message; tool results and user text share one user message.
 * Thinking blocks lead their assistant message, as the API requires.
 */
export function toAnthropicMessages(transcript: readonly Turn[]): MessageParam[] {
  const messages: MessageParam[] = [];
  let role: 'user' | 'assistant' | null = null;
  let blocks: ContentBlockParam[] = [];

  const append = (nextRole: 'user' | 'assistant', block: ContentBlockParam) => {
    if (role !== nextRole) {
      blocks = [];
      role = nextRole;
      messages.push({ role: nextRole, content: blocks });
    }
    blocks.push(block);
  };

  for (const turn of transcript) {
    switch (turn.type) {
      case 'user_message':
        append('user', { type: 'text', text: turn.text || EMPTY_TEXT });
        break;
      case 'assistant_text':
        append('assistant', { type: 'text', text: turn.text || EMPTY_TEXT });
        break;
      case 'tool_request':
        append('assistant', {
          type: 'tool_use',
          id: turn.id,
          name: turn.name,
          input: turn.arguments,
        });
        if (turn.thinking && turn.thinking.length > 0) {
          blocks.unshift(...turn.thinking.map(toThinkingBlock));
        }
        break;
      case 'tool_result':
        append('user', {
          type: 'tool_result',
          tool_use_id: turn.id,
          content: turn.output || EMPTY_OUTPUT,
          is_error: !turn.ok,
        });
        break;
    }
  }

  return messages;
}

function toThinkingBlock(trace: ThinkingTrace): ContentBlockParam {
  return trace.type === 'thinking'
    ? { type: 'thinking', thinking: trace.thinking, signature: trace.signature }
    : { type: 'redacted_thinking', data: trace.data };
}

export function toAnthropicTools(specs: readonly ToolSpec[]): Anthropic.Messages.Tool[] {
  return specs.map((spec): Anthropic.Messages.Tool => {
    const entries = Object.entries(spec.parameterSchema);
    return {
      name: spec.name,
      description: spec.description,
      input_schema: {
        type: 'object',
        properties: Object.fromEntries(
          entries.map(([param, schema]) => [
            param,
            schema.description
              ? { type: schema.type, description: schema.description }
              : { type: schema.type },
          ])
        ),
        required: entries.filter(([, schema]) => schema.required).map(([param]) => param),
      },
    };
  });
}

/**
 * Extended-thinking parameter for a thinking level. AUTO leaves the choice to
 * the provider; LOW and HIGH need room for a budget below `maxTokens`.
 */
export function thinkingConfig(
  level: ThinkingLevel,
  maxTokens: number
): Anthropic.Messages.ThinkingConfigParam | undefined {
  if (level === 'AUTO' || maxTokens <= MIN_THINKING_BUDGET) {
    return undefined;
  }
  const budget =
    level === 'LOW' ? MIN_THINKING_BUDGET : Math.max(MIN_THINKING_BUDGET, maxTokens - 2048);
  return { type: 'enabled', budget_tokens: budget };
}

/**
 * Reduce a Messages API reply to final text or a single tool call. Text that
 * accompanies a tool call is kept as its preamble.
 */
export function parseAnthropicResponse(reply: AssistantReply): ModelResponse {
  const texts: string[] = [];
  const thinking: ThinkingTrace[] = [];
  let toolUse: { id: string; name: string; input: unknown } | undefined;

  for (const block of reply.content) {
    if (block.type === 'text' && block.text) {
      texts.push(block.text);
    } else if (block.type === 'thinking' && block.thinking !== undefined) {
      thinking.push({
        type: 'thinking',
        thinking: block.thinking,
        signature: block.signature ?? '',
      });
    } else if (block.type === 'redacted_thinking' && block.data !== undefined) {
      thinking.push({ type: 'redacted_thinking', data: block.data });
    } else if (block.type === 'tool_use' && block.id && block.name && !toolUse) {
      toolUse = { id: block.id, name: block.name, input: block.input };
    }
  }

  const text = texts.join('\n').trim();
  const usage = {
    inputTokens: reply.usage.input_tokens,
    outputTokens: reply.usage.output_tokens,
  };

  if (toolUse) {
    return {
      kind: 'tool_call',
      id: toolUse.id,
      name: toolUse.name,
      arguments: isRecord(toolUse.input) ? toolUse.input : {},
      ...(text ? { preamble: text } : {}),
      ...(thinking.length > 0 ? { thinking } : {}),
      usage,
    };
  }
  return { kind: 'text', text, usage };
}

import { ThinkingLevel, Turn } from '../types';
import { Styler } from './styler';

const ARG_PREVIEW_LENGTH = 60;

/** What the user is asked to approve: the command itself for run_shell */
export function describeToolCall(toolName: string, args: Record<string, unknown>): string {
  if (toolName === 'run_shell' && typeof args.command === 'string') {
    return args.command;
  }
  return `${toolName}(${JSON.stringify(args)})`;
}

export function previewArgs(args: Record<string, unknown>): string {
  return Object.entries(args)
    .map(([key, value]) => {
      const json = JSON.stringify(value) ?? String(value);
      const shown =
        json.length > ARG_PREVIEW_LENGTH ? `${json.slice(0, ARG_PREVIEW_LENGTH)}…` : json;
      return `${key}=${shown}`;
    })
    .join(', ');
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

/**
 * Render a transcript turn for the terminal. User messages are already on
 * screen, so they render as null.
 */
export function formatTurn(turn: Turn, s: Styler): string | null {
  switch (turn.type) {
    case 'user_message':
      return null;
    case 'assistant_text':
      return `${s.green(s.bold('Agent:'))} ${turn.text || s.dim('(no response)')}`;
    case 'tool_request':
      return s.dim(`→ ${turn.name}(${previewArgs(turn.arguments)})`);
    case 'tool_result': {
      const status = turn.ok ? s.green('ok') : s.red(`failed: ${turn.errorKind ?? 'error'}`);
      const body = turn.output ? indent(turn.output) : s.dim(indent('(no output)'));
      return `${s.dim('←')} ${turn.name} ${status}\n${body}`;
    }
  }
}

export function approvalPrompt(
  toolName: string,
  args: Record<string, unknown>,
  s: Styler
): string {
  return `${s.yellow('Agent wants to run:')} ${describeToolCall(toolName, args)}\n${s.bold('Approve? [y/N] ')}`;
}

/** Only an explicit yes approves */
export function isApproval(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export function formatError(message: string, s: Styler): string {
  return `${s.red('Error:')} ${message}`;
}

export function welcomeBanner(
  info: { workspace: string; model: string; thinkingLevel: ThinkingLevel },
  s: Styler
): string {
  return [
    s.cyan(s.bold('sandbox-agent')),
    s.dim(`workspace: ${info.workspace}`),
    s.dim(`model: ${info.model} (thinking ${info.thinkingLevel})`),
    s.dim("Type a request. '/reset' clears the conversation, 'exit' or 'quit' leaves."),
  ].join('\n');
}

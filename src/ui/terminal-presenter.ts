import { AgentState, Presenter, Turn } from '../types';
import { approvalPrompt, formatError, formatTurn, isApproval } from './format';
import { Spinner } from './spinner';
import { Styler } from './styler';

/** The part of a readline/promises Interface the presenter asks questions through */
export interface LineReader {
  question(query: string, options: { signal?: AbortSignal }): Promise<string>;
}

export interface TextOutput {
  write(text: string): unknown;
}

/**
 * Presenter for an interactive terminal: turns go to stdout, errors and the
 * working indicator to stderr.
 */
export class TerminalPresenter implements Presenter {
  constructor(
    private readonly reader: LineReader,
    private readonly S: Styler,
    private readonly spinner: Spinner,
    private readonly out: TextOutput = process.stdout,
    private readonly err: TextOutput = process.stderr
  ) {}

  print(text: string): void {
    this.spinner.stop();
    this.out.write(`${text}\n`);
  }

  displayTurn(turn: Turn): void {
    const text = formatTurn(turn, this.S);
    if (text !== null) {
      this.print(text);
    }
  }

  async displayApprovalPrompt(
    toolName: string,
    args: Record<string, unknown>,
    signal: AbortSignal
  ): Promise<boolean> {
    this.spinner.stop();
    try {
      const answer = await this.reader.question(approvalPrompt(toolName, args, this.S), { signal });
      return isApproval(answer);
    } catch (error) {
      if (signal.aborted) {
        this.out.write('\n');
        return false;
      }
      throw error;
    }
  }

  displayError(message: string): void {
    this.spinner.stop();
    this.err.write(`${formatError(message, this.S)}\n`);
  }

  displayStatus(state: AgentState): void {
    if (state === 'AwaitingModel') {
      this.spinner.start('Thinking');
    } else if (state === 'ExecutingTool') {
      this.spinner.start('Running tool');
    } else {
      this.spinner.stop();
    }
  }
}

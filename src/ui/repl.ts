import { ThinkingLevel } from '../types';
import { AgentLoop } from '../orchestration/agent-loop';
import { LineReader } from './terminal-presenter';
import { welcomeBanner } from './format';
import { Styler } from './styler';

/** readline/promises Interface as the REPL uses it */
export interface ReplInput extends LineReader {
  on(event: 'SIGINT' | 'close', listener: () => void): unknown;
  off(event: 'SIGINT' | 'close', listener: () => void): unknown;
}

export interface ReplOutput {
  print(text: string): void;
}

export interface ReplInfo {
  workspace: string;
  model: string;
  thinkingLevel: ThinkingLevel;
}

const EXIT_COMMANDS = new Set(['exit', 'quit']);
const RESET_COMMAND = '/reset';

/**
 * Read-eval loop over the agent. Ctrl+C cancels a running exchange; at the
 * prompt it ends the session, as do `exit`, `quit` and end of input.
 */
export class Repl {
  private closed = false;
  private promptController: AbortController | null = null;

  constructor(
    private readonly input: ReplInput,
    private readonly output: ReplOutput,
    private readonly loop: AgentLoop,
    private readonly S: Styler
  ) {}

  async run(info: ReplInfo): Promise<void> {
    const onSigint = () => this.interrupt();
    const onClose = () => {
      this.closed = true;
      this.promptController?.abort();
      this.loop.cancel();
    };
    this.input.on('SIGINT', onSigint);
    this.input.on('close', onClose);

    this.output.print(welcomeBanner(info, this.S));
    try {
      while (!this.closed) {
        const line = await this.prompt();
        if (line === null) break;

        const input = line.trim();
        if (!input) continue;

        const command = input.toLowerCase();
        if (EXIT_COMMANDS.has(command)) break;
        if (command === RESET_COMMAND) {
          this.loop.reset();
          this.output.print(this.S.dim('Conversation cleared.'));
          continue;
        }

        await this.loop.submitUserMessage(input);
      }
    } finally {
      this.input.off('SIGINT', onSigint);
      this.input.off('close', onClose);
    }
  }

  private async prompt(): Promise<string | null> {
    const controller = new AbortController();
    this.promptController = controller;
    try {
      return await this.input.question(this.S.bold('> '), { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) return null;
      throw error;
    } finally {
      this.promptController = null;
    }
  }

  private interrupt(): void {
    if (this.loop.cancel()) return;
    this.promptController?.abort();
  }
}

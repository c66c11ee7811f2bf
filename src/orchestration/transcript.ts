import { ToolRequestTurn, Turn } from '../types';

/**
 * Conversation transcript
 *
 * Append-only while an exchange runs. A ToolRequest must be answered by its
 * ToolResult before anything else is appended, so every request in a
 * replayed transcript has exactly one matching result after it.
 */
export class Transcript {
  private entries: Turn[] = [];

  /** Copy of the turns so far */
  get turns(): Turn[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  /** The tool request still waiting for its result, if any */
  get openToolRequest(): ToolRequestTurn | undefined {
    const last = this.entries[this.entries.length - 1];
    return last?.type === 'tool_request' ? last : undefined;
  }

  append(turn: Turn): void {
    const open = this.openToolRequest;
    if (open && (turn.type !== 'tool_result' || turn.id !== open.id)) {
      throw new Error(`Tool request ${open.id} (${open.name}) has no result yet`);
    }
    if (!open && turn.type === 'tool_result') {
      throw new Error(`Tool result ${turn.id} does not answer a pending tool request`);
    }
    this.entries.push(turn);
  }

  checkpoint(): number {
    return this.entries.length;
  }

  /** Drop every turn appended after `checkpoint` */
  rollbackTo(checkpoint: number): void {
    if (checkpoint < 0 || checkpoint > this.entries.length) {
      throw new Error(`Invalid transcript checkpoint ${checkpoint}`);
    }
    this.entries.length = checkpoint;
  }

  reset(): void {
    this.entries = [];
  }
}

import { CancelledError, HandlerTimeoutError, errorMessage } from '../errors';
import { createLogger, emitApproval, recordApproval } from '../observability';

const log = createLogger('Approval');

/**
 * Whatever asks the human. The signal fires when the question is no longer
 * needed (timeout or cancellation) and the prompt should be dismissed.
 */
export interface ApprovalProvider {
  displayApprovalPrompt(
    toolName: string,
    args: Record<string, unknown>,
    signal: AbortSignal
  ): Promise<boolean>;
}

export interface ApprovalGateOptions {
  /** Fail the request with HandlerTimeout after this long. Unset waits forever. */
  timeoutMs?: number;
}

/**
 * Approval gate - the single checkpoint before a tool flagged
 * `requiresApproval` runs.
 *
 * At most one request is outstanding at a time. Resolves with the user's
 * decision; rejects with HandlerTimeoutError when the optional timeout
 * elapses and with CancelledError when the caller's signal aborts.
 */
export class ApprovalGate {
  private pending = false;

  constructor(
    private readonly provider: ApprovalProvider,
    private readonly options: ApprovalGateOptions = {}
  ) {}

  get isPending(): boolean {
    return this.pending;
  }

  async requestApproval(
    toolName: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<boolean> {
    if (this.pending) {
      throw new Error('An approval request is already pending');
    }
    if (signal?.aborted) {
      throw new CancelledError();
    }

    this.pending = true;
    const startedAt = Date.now();
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    if (this.options.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.options.timeoutMs);
    }

    try {
      const decision = this.provider.displayApprovalPrompt(toolName, args, controller.signal);
      void decision.catch((error: unknown) => {
        if (controller.signal.aborted) {
          log.debug('Dismissed prompt settled with', errorMessage(error));
        }
      });

      const approved = await Promise.race([decision, rejectOnAbort(controller.signal)]);
      // A dismissed prompt may settle with a decision; the abort reason wins
      if (controller.signal.aborted) {
        throw new CancelledError();
      }
      this.record(toolName, approved ? 'granted' : 'denied', startedAt);
      return approved;
    } catch (error) {
      if (timedOut) {
        this.record(toolName, 'timeout', startedAt);
        throw new HandlerTimeoutError(
          `No approval decision for ${toolName} within ${this.options.timeoutMs} ms`
        );
      }
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      this.pending = false;
    }
  }

  private record(
    toolName: string,
    decision: 'granted' | 'denied' | 'timeout',
    startedAt: number
  ): void {
    log.debug(`${toolName}: ${decision}`);
    emitApproval({ toolName, decision, waitMs: Date.now() - startedAt });
    recordApproval({ toolName, decision });
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError());
      return;
    }
    signal.addEventListener('abort', () => reject(new CancelledError()), { once: true });
  });
}

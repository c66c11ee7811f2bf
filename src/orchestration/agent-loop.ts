import { randomUUID } from 'node:crypto';
import {
  AgentState,
  ExchangeResult,
  ModelResponse,
  ModelToolCallResponse,
  Presenter,
  ThinkingLevel,
  ToolErrorKind,
  ToolRequestTurn,
  Turn,
} from '../types';
import { ModelClient } from '../llm/model-client';
import { ToolRegistry } from '../tools/registry';
import { ApprovalGate } from '../hooks/approval-gate';
import {
  CancelledError,
  HandlerTimeoutError,
  ModelUnavailableError,
  RoundLimitError,
  errorMessage,
} from '../errors';
import { Transcript } from './transcript';
import {
  LangfuseTrace,
  createGeneration,
  createLogger,
  createSpan,
  createTrace,
  emitApiError,
  emitApiRequest,
  emitSessionEnd,
  emitSessionStart,
  emitToolUse,
  flushLangfuse,
  recordApiDuration,
  recordSession,
  recordTokens,
  recordToolUse,
} from '../observability';

const log = createLogger('Agent');

export const DENIED_OUTPUT = 'denied by user';

export interface AgentLoopOptions {
  thinkingLevel: ThinkingLevel;
  /** Model calls allowed per user message */
  maxToolRounds: number;
  /** Called on every state transition */
  onStateChange?: (state: AgentState) => void;
}

interface ExchangeContext {
  sessionId: string;
  signal: AbortSignal;
  trace: LangfuseTrace | null;
  modelCalls: number;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Agent loop - drives one user message to a final answer
 *
 * Implements the exchange as a state machine:
 * 1. Appends the user message and asks the model for a response
 * 2. Final text ends the exchange (Done, then Idle)
 * 3. A tool call is recorded, passed through the approval gate when its spec
 *    asks for one, executed through the registry, and its result is sent
 *    back to the model
 *
 * Tool failures are handed back to the model. A model failure, the round
 * limit or a cancel rolls the transcript back to before the user message and
 * is reported through the presenter; nothing escapes `submitUserMessage`.
 */
export class AgentLoop {
  private readonly transcript = new Transcript();
  private currentState: AgentState = 'Idle';
  private controller: AbortController | null = null;

  constructor(
    private readonly model: ModelClient,
    private readonly registry: ToolRegistry,
    private readonly approvalGate: ApprovalGate,
    private readonly presenter: Presenter,
    private readonly options: AgentLoopOptions
  ) {}

  get state(): AgentState {
    return this.currentState;
  }

  get turns(): Turn[] {
    return this.transcript.turns;
  }

  get isBusy(): boolean {
    return this.controller !== null;
  }

  async submitUserMessage(text: string): Promise<ExchangeResult> {
    if (this.controller) {
      throw new Error('An exchange is already in progress');
    }

    const controller = new AbortController();
    this.controller = controller;
    const checkpoint = this.transcript.checkpoint();
    const startedAt = Date.now();
    const context: ExchangeContext = {
      sessionId: randomUUID(),
      signal: controller.signal,
      trace: null,
      modelCalls: 0,
      inputTokens: 0,
      outputTokens: 0,
    };

    emitSessionStart({
      sessionId: context.sessionId,
      model: this.model.model,
      thinkingLevel: this.options.thinkingLevel,
      messageLength: text.length,
    });
    recordSession({ model: this.model.model });
    context.trace = createTrace({
      id: context.sessionId,
      name: 'exchange',
      metadata: { thinkingLevel: this.options.thinkingLevel },
      tags: [this.model.model, this.options.thinkingLevel],
      input: text,
    });

    let result: ExchangeResult;
    try {
      this.append({ type: 'user_message', text });
      const answer = await this.runExchange(context);
      this.setState('Done');
      result = { status: 'completed', text: answer };
    } catch (error) {
      this.transcript.rollbackTo(checkpoint);
      const cancelled = error instanceof CancelledError || controller.signal.aborted;
      const message = cancelled ? new CancelledError().message : errorMessage(error);
      if (!cancelled) {
        log.debug('Exchange failed:', error);
        this.setState('Failed');
      }
      this.presenter.displayError(message);
      result = { status: cancelled ? 'cancelled' : 'failed', error: message };
    } finally {
      this.controller = null;
    }

    emitSessionEnd({
      sessionId: context.sessionId,
      status: result.status,
      totalTurns: context.modelCalls,
      totalInputTokens: context.inputTokens,
      totalOutputTokens: context.outputTokens,
      totalDurationMs: Date.now() - startedAt,
      error: result.error,
    });
    context.trace?.update({ output: result.text ?? result.error });
    try {
      await flushLangfuse();
    } catch (error) {
      log.warn('Failed to flush traces:', errorMessage(error));
    }

    this.setState('Idle');
    return result;
  }

  /**
   * Abort the running exchange: the pending model call or shell command is
   * stopped and a pending approval prompt is dismissed. Returns false when
   * nothing was running.
   */
  cancel(): boolean {
    if (!this.controller || this.controller.signal.aborted) {
      return false;
    }
    log.debug(`Cancelling in state ${this.currentState}`);
    this.controller.abort();
    return true;
  }

  /** Forget the conversation so far */
  reset(): void {
    if (this.controller) {
      throw new Error('Cannot reset while an exchange is in progress');
    }
    this.transcript.reset();
  }

  private async runExchange(context: ExchangeContext): Promise<string> {
    for (let round = 1; round <= this.options.maxToolRounds; round++) {
      this.setState('AwaitingModel');
      const response = await this.callModel(context, round);

      if (response.kind === 'text') {
        this.append({ type: 'assistant_text', text: response.text });
        return response.text;
      }
      await this.handleToolCall(response, context);
    }
    throw new RoundLimitError(this.options.maxToolRounds);
  }

  private async callModel(context: ExchangeContext, round: number): Promise<ModelResponse> {
    const request = {
      transcript: this.transcript.turns,
      toolSpecs: this.registry.listSpecs(),
      thinkingLevel: this.options.thinkingLevel,
    };
    const apiStartTime = Date.now();
    context.modelCalls++;

    let response: ModelResponse;
    try {
      response = await this.model.complete(request, { signal: context.signal });
    } catch (error) {
      if (error instanceof CancelledError || context.signal.aborted) {
        throw new CancelledError();
      }
      emitApiError({
        sessionId: context.sessionId,
        model: this.model.model,
        error: errorMessage(error),
        durationMs: Date.now() - apiStartTime,
      });
      throw error instanceof ModelUnavailableError
        ? error
        : new ModelUnavailableError(`Model request failed: ${errorMessage(error)}`, {
            cause: error,
          });
    }
    if (context.signal.aborted) {
      throw new CancelledError();
    }

    const apiDurationMs = Date.now() - apiStartTime;
    const inputTokens = response.usage?.inputTokens ?? 0;
    const outputTokens = response.usage?.outputTokens ?? 0;
    context.inputTokens += inputTokens;
    context.outputTokens += outputTokens;

    emitApiRequest({
      sessionId: context.sessionId,
      model: this.model.model,
      inputTokens,
      outputTokens,
      durationMs: apiDurationMs,
    });
    recordApiDuration(apiDurationMs, { model: this.model.model });
    recordTokens('input', inputTokens, { model: this.model.model });
    recordTokens('output', outputTokens, { model: this.model.model });
    createGeneration(context.trace, {
      name: `turn-${round}`,
      model: this.model.model,
      modelParameters: { thinkingLevel: this.options.thinkingLevel },
      input: request.transcript,
      output: response,
      usage: { input: inputTokens, output: outputTokens },
      metadata: { durationMs: apiDurationMs },
    });

    log.debug(
      `Model response (round ${round}): ${response.kind === 'text' ? 'text' : `tool_call ${response.name}`}`
    );
    return response;
  }

  private async handleToolCall(
    call: ModelToolCallResponse,
    context: ExchangeContext
  ): Promise<void> {
    if (call.preamble) {
      this.append({ type: 'assistant_text', text: call.preamble });
    }
    const request: ToolRequestTurn = {
      type: 'tool_request',
      id: call.id,
      name: call.name,
      arguments: call.arguments,
      ...(call.thinking && call.thinking.length > 0 ? { thinking: call.thinking } : {}),
    };
    this.append(request);

    const spec = this.registry.getSpec(call.name);
    if (spec?.requiresApproval) {
      this.setState('AwaitingApproval');
      let approved: boolean;
      try {
        approved = await this.approvalGate.requestApproval(call.name, call.arguments, context.signal);
      } catch (error) {
        if (error instanceof HandlerTimeoutError) {
          this.appendResult(request, { output: error.message, ok: false, errorKind: error.kind });
          return;
        }
        throw error;
      }
      if (!approved) {
        log.debug(`${call.name} denied by user`);
        this.appendResult(request, { output: DENIED_OUTPUT, ok: false, errorKind: 'ApprovalDenied' });
        return;
      }
    }

    this.setState('ExecutingTool');
    const toolStartTime = Date.now();
    const outcome = await this.registry.invoke(call.name, call.arguments, {
      signal: context.signal,
    });
    if (context.signal.aborted) {
      throw new CancelledError();
    }
    const toolDurationMs = Date.now() - toolStartTime;

    emitToolUse({
      sessionId: context.sessionId,
      toolName: call.name,
      success: outcome.success,
      durationMs: toolDurationMs,
      errorKind: outcome.errorKind,
    });
    recordToolUse({ toolName: call.name, success: outcome.success, durationMs: toolDurationMs });
    createSpan(context.trace, {
      name: `tool:${call.name}`,
      input: call.arguments,
      output: outcome.output,
      metadata: {
        success: outcome.success,
        durationMs: toolDurationMs,
        errorKind: outcome.errorKind,
      },
    });

    this.appendResult(request, {
      output: outcome.output,
      ok: outcome.success,
      errorKind: outcome.errorKind,
    });
  }

  private appendResult(
    request: ToolRequestTurn,
    result: { output: string; ok: boolean; errorKind?: ToolErrorKind }
  ): void {
    this.append({
      type: 'tool_result',
      id: request.id,
      name: request.name,
      output: result.output,
      ok: result.ok,
      ...(result.errorKind ? { errorKind: result.errorKind } : {}),
    });
  }

  private append(turn: Turn): void {
    this.transcript.append(turn);
    this.presenter.displayTurn(turn);
  }

  private setState(state: AgentState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.presenter.displayStatus?.(state);
    this.options.onStateChange?.(state);
  }
}

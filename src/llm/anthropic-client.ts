import Anthropic from '@anthropic-ai/sdk';
import { ModelRequest, ModelResponse } from '../types';
import { CancelledError, ModelUnavailableError, errorMessage } from '../errors';
import { createLogger } from '../observability';
import { ModelCallOptions, ModelClient } from './model-client';
import {
  AssistantReply,
  parseAnthropicResponse,
  thinkingConfig,
  toAnthropicMessages,
  toAnthropicTools,
} from './anthropic-messages';

const log = createLogger('Model');

/**
 * The slice of the SDK this client calls, so tests can stand in for it
 */
export interface MessagesApi {
  create(
    params: Anthropic.Messages.MessageCreateParamsNonStreaming,
    options: { signal?: AbortSignal; timeout?: number }
  ): Promise<AssistantReply>;
}

export interface AnthropicModelClientOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  maxRetries: number;
  /** Built per request so it always reflects the registered tools */
  systemPrompt: () => string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

/** Five minutes per API call */
const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Model client over the Anthropic Messages API
 */
export class AnthropicModelClient implements ModelClient {
  readonly model: string;
  private readonly api: MessagesApi;

  constructor(
    private readonly options: AnthropicModelClientOptions,
    api?: MessagesApi
  ) {
    this.model = options.model;
    this.api =
      api ??
      sdkMessagesApi(new Anthropic({ apiKey: options.apiKey, maxRetries: options.maxRetries }));
  }

  async complete(request: ModelRequest, callOptions: ModelCallOptions = {}): Promise<ModelResponse> {
    const tools = toAnthropicTools(request.toolSpecs);
    const thinking = thinkingConfig(request.thinkingLevel, this.options.maxTokens);

    const params: Anthropic.Messages.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.options.maxTokens,
      system: this.options.systemPrompt(),
      messages: toAnthropicMessages(request.transcript),
    };
    if (tools.length > 0) {
      params.tools = tools;
      params.tool_choice = { type: 'auto', disable_parallel_tool_use: true };
    }
    if (thinking) {
      params.thinking = thinking;
    }

    log.debug(
      `Request: ${params.messages.length} messages, ${tools.length} tools, thinking ${request.thinkingLevel}`
    );

    try {
      const message = await this.api.create(params, {
        signal: callOptions.signal,
        timeout: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
      log.debug(
        `Response - stop_reason: ${message.stop_reason ?? 'unknown'}, content_types:`,
        message.content.map((block) => block.type)
      );
      return parseAnthropicResponse(message);
    } catch (error) {
      if (callOptions.signal?.aborted || error instanceof Anthropic.APIUserAbortError) {
        throw new CancelledError();
      }
      throw new ModelUnavailableError(`Model request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

function sdkMessagesApi(client: Anthropic): MessagesApi {
  return {
    create: (params, options) => client.messages.create(params, options),
  };
}

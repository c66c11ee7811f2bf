import { ModelRequest, ModelResponse } from '../types';

export interface ModelCallOptions {
  signal?: AbortSignal;
}

/**
 * The LLM planner. Given the full transcript and the tool specs it answers
 * with either final text or one tool call.
 *
 * Implementations throw ModelUnavailableError when the backend fails and
 * CancelledError when `signal` aborts the call.
 */
export interface ModelClient {
  readonly model: string;
  complete(request: ModelRequest, options?: ModelCallOptions): Promise<ModelResponse>;
}

import Langfuse from 'langfuse';
import { errorMessage } from '../errors';
import { createLogger } from './logger';

const log = createLogger('Langfuse');

/**
 * Optional Langfuse tracing: one trace per user message, a generation per
 * model call and a span per tool execution. Everything here is a no-op
 * unless both Langfuse keys are set.
 */

export type LangfuseTrace = ReturnType<Langfuse['trace']>;

let langfuseClient: Langfuse | null = null;

export function isLangfuseEnabled(): boolean {
  return Boolean(process.env.LANGFUSE_SECRET_KEY && process.env.LANGFUSE_PUBLIC_KEY);
}

export function getLangfuse(): Langfuse | null {
  const secretKey = process.env.LANGFUSE_SECRET_KEY;
  const publicKey = process.env.LANGFUSE_PUBLIC_KEY;
  if (!secretKey || !publicKey) {
    return null;
  }

  if (!langfuseClient) {
    langfuseClient = new Langfuse({
      secretKey,
      publicKey,
      baseUrl: process.env.LANGFUSE_BASE_URL || 'https://cloud.langfuse.com',
    });
  }
  return langfuseClient;
}

export function createTrace(params: {
  id: string;
  name: string;
  metadata?: Record<string, unknown>;
  tags?: string[];
  input?: unknown;
}): LangfuseTrace | null {
  const langfuse = getLangfuse();
  if (!langfuse) return null;

  return langfuse.trace({
    id: params.id,
    name: params.name,
    metadata: params.metadata,
    tags: params.tags,
    input: params.input,
  });
}

export function createGeneration(
  trace: LangfuseTrace | null,
  params: {
    name: string;
    model: string;
    modelParameters?: Record<string, string | number | boolean | null>;
    input?: unknown;
    output?: unknown;
    usage?: { input?: number; output?: number };
    metadata?: Record<string, unknown>;
  }
): void {
  trace?.generation({
    name: params.name,
    model: params.model,
    modelParameters: params.modelParameters,
    input: params.input,
    output: params.output,
    usage: params.usage,
    metadata: params.metadata,
  });
}

export function createSpan(
  trace: LangfuseTrace | null,
  params: {
    name: string;
    input?: unknown;
    output?: unknown;
    metadata?: Record<string, unknown>;
  }
): void {
  trace?.span({
    name: params.name,
    input: params.input,
    output: params.output,
    metadata: params.metadata,
  });
}

export async function flushLangfuse(): Promise<void> {
  if (langfuseClient) {
    await langfuseClient.flushAsync();
  }
}

/** Flush and close the client. A failure is logged, not thrown */
export async function shutdownLangfuse(): Promise<void> {
  if (!langfuseClient) return;
  const client = langfuseClient;
  langfuseClient = null;
  try {
    await client.shutdownAsync();
  } catch (error) {
    log.warn('Failed to shut down tracing:', errorMessage(error));
  }
}

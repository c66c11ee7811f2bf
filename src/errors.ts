import { ToolErrorKind } from './types';

/**
 * Base class for failures a tool reports back to the model.
 * The registry turns these into a failed ToolOutcome carrying `kind`.
 */
export class ToolError extends Error {
  constructor(
    readonly kind: ToolErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export class InvalidPathError extends ToolError {
  constructor(message: string) {
    super('InvalidPath', message);
    this.name = 'InvalidPathError';
  }
}

export class SandboxEscapeError extends ToolError {
  constructor(
    readonly requestedPath: string,
    root: string
  ) {
    super(
      'SandboxEscape',
      `Access denied to ${requestedPath}: path resolves outside the workspace ${root}`
    );
    this.name = 'SandboxEscapeError';
  }
}

export class UnknownToolError extends ToolError {
  constructor(readonly toolName: string) {
    super('UnknownTool', `Unknown tool '${toolName}'`);
    this.name = 'UnknownToolError';
  }
}

export class MissingParameterError extends ToolError {
  constructor(readonly parameter: string) {
    super('MissingParameter', `Missing required parameter '${parameter}'`);
    this.name = 'MissingParameterError';
  }
}

export class InvalidParameterError extends ToolError {
  constructor(
    readonly parameter: string,
    expected: string
  ) {
    super('InvalidParameter', `Parameter '${parameter}' must be ${expected}`);
    this.name = 'InvalidParameterError';
  }
}

export class FileNotFoundError extends ToolError {
  constructor(readonly requestedPath: string) {
    super('FileNotFound', `File not found: ${requestedPath}`);
    this.name = 'FileNotFoundError';
  }
}

export class HandlerTimeoutError extends ToolError {
  constructor(message: string) {
    super('HandlerTimeout', message);
    this.name = 'HandlerTimeoutError';
  }
}

/** The model backend could not produce a response. Fatal to the current exchange. */
export class ModelUnavailableError extends Error {
  readonly kind = 'ModelUnavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelUnavailableError';
  }
}

/** The model kept calling tools past the per-message round limit */
export class RoundLimitError extends Error {
  readonly kind = 'RoundLimit';

  constructor(readonly rounds: number) {
    super(`No final answer after ${rounds} model calls; stopping this request`);
    this.name = 'RoundLimitError';
  }
}

/** The user cancelled the exchange while it was in flight */
export class CancelledError extends Error {
  readonly kind = 'Cancelled';

  constructor(message: string = 'Cancelled by user') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

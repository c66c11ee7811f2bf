export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface ParameterSpec {
  type: ParameterType;
  required: boolean;
  description?: string;
}

/**
 * Declarative description of a tool, shown to the model as-is
 */
export interface ToolSpec {
  name: string;
  description: string;
  parameterSchema: Record<string, ParameterSpec>;
  requiresApproval: boolean;
}

export type ToolErrorKind =
  | 'InvalidPath'
  | 'SandboxEscape'
  | 'UnknownTool'
  | 'MissingParameter'
  | 'InvalidParameter'
  | 'FileNotFound'
  | 'HandlerError'
  | 'HandlerTimeout'
  | 'ApprovalDenied';

export interface ToolOutcome {
  success: boolean;
  output: string;
  errorKind?: ToolErrorKind;
}

/** A named tool call with its raw arguments */
export interface ToolInvocationRequest {
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolExecutionContext {
  signal?: AbortSignal;
}

export type ToolHandler = (
  args: Record<string, unknown>,
  context: ToolExecutionContext
) => Promise<ToolOutcome>;

import {
  ParameterSpec,
  ToolExecutionContext,
  ToolHandler,
  ToolOutcome,
  ToolSpec,
} from '../types';
import {
  InvalidParameterError,
  MissingParameterError,
  ToolError,
  UnknownToolError,
  errorMessage,
} from '../errors';
import { createLogger } from '../observability/logger';

const log = createLogger('Tools');

interface RegisteredTool {
  spec: ToolSpec;
  handler: ToolHandler;
}

/**
 * Tool registry
 *
 * Maps tool names to their spec and handler. `invoke` never throws: unknown
 * tools, bad arguments and handler failures all come back as a failed
 * ToolOutcome so the agent loop can hand them to the model.
 */
export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  register(spec: ToolSpec, handler: ToolHandler): void {
    if (this.tools.has(spec.name)) {
      throw new Error(`Tool "${spec.name}" is already registered`);
    }
    this.tools.set(spec.name, { spec: freezeSpec(spec), handler });
  }

  listSpecs(): ToolSpec[] {
    return Array.from(this.tools.values(), (tool) => tool.spec);
  }

  getSpec(name: string): ToolSpec | undefined {
    return this.tools.get(name)?.spec;
  }

  async invoke(
    name: string,
    args: Record<string, unknown>,
    context: ToolExecutionContext = {}
  ): Promise<ToolOutcome> {
    try {
      const tool = this.tools.get(name);
      if (!tool) {
        throw new UnknownToolError(name);
      }
      validateArguments(tool.spec, args);
      return await tool.handler(args, context);
    } catch (error) {
      if (error instanceof ToolError) {
        return { success: false, output: error.message, errorKind: error.kind };
      }
      log.debug(`Handler for ${name} failed:`, errorMessage(error));
      return {
        success: false,
        output: `Error while running ${name}: ${errorMessage(error)}`,
        errorKind: 'HandlerError',
      };
    }
  }
}

function validateArguments(spec: ToolSpec, args: Record<string, unknown>): void {
  for (const [param, schema] of Object.entries(spec.parameterSchema)) {
    const value = args[param];
    if (value === undefined || value === null) {
      if (schema.required) {
        throw new MissingParameterError(param);
      }
      continue;
    }
    if (!matchesType(value, schema)) {
      throw new InvalidParameterError(param, `of type ${schema.type}`);
    }
  }
}

function matchesType(value: unknown, schema: ParameterSpec): boolean {
  switch (schema.type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
  }
}

function freezeSpec(spec: ToolSpec): ToolSpec {
  const parameterSchema: Record<string, ParameterSpec> = {};
  for (const [param, schema] of Object.entries(spec.parameterSchema)) {
    parameterSchema[param] = Object.freeze({ ...schema });
  }
  return Object.freeze({ ...spec, parameterSchema: Object.freeze(parameterSchema) });
}

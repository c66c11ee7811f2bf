import { ToolHandler, ToolSpec } from '../../types';
import { HandlerTimeoutError } from '../../errors';
import { ShellRunner } from '../shell-runner';
import { capOutput } from '../output';
import { stringArg } from '../args';

export const RUN_SHELL_SPEC: ToolSpec = {
  name: 'run_shell',
  description:
    'Executes a shell command with the workspace as working directory. ' +
    'Returns combined stdout and stderr. Requires user approval.',
  parameterSchema: {
    command: {
      type: 'string',
      required: true,
      description: "The shell command to run (e.g. 'ls -la', 'python app.py')",
    },
  },
  requiresApproval: true,
};

export const NO_OUTPUT_MESSAGE = 'Command executed successfully (no output).';

export interface RunShellDeps {
  runner: ShellRunner;
  root: string;
  timeoutMs: number;
  outputLimit: number;
}

export function createRunShellHandler(deps: RunShellDeps): ToolHandler {
  return async (args, context) => {
    const command = stringArg(args, 'command');
    const result = await deps.runner.run(command, {
      cwd: deps.root,
      timeoutMs: deps.timeoutMs,
      signal: context.signal,
      captureLimit: deps.outputLimit,
    });

    if (result.timedOut) {
      throw new HandlerTimeoutError(`Command timed out after ${deps.timeoutMs} ms`);
    }
    if (result.aborted) {
      return { success: false, output: 'Command cancelled', errorKind: 'HandlerError' };
    }

    let output = `${result.stdout}\n${result.stderr}`.trim() || NO_OUTPUT_MESSAGE;
    const success = result.exitCode === 0;
    if (!success) {
      output += `\n[exit code ${result.exitCode ?? 'none'}]`;
    }

    return {
      success,
      output: capOutput(output, deps.outputLimit, result.droppedChars),
      ...(success ? {} : { errorKind: 'HandlerError' as const }),
    };
  };
}

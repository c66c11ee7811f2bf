import * as fs from 'node:fs/promises';
import { ToolHandler, ToolSpec } from '../../types';
import { FileNotFoundError, InvalidPathError } from '../../errors';
import { SandboxPathResolver } from '../../sandbox/path-resolver';
import { statIfExists } from '../fs-utils';
import { capOutput } from '../output';
import { optionalPositiveIntArg, stringArg } from '../args';

export const READ_FILE_SPEC: ToolSpec = {
  name: 'read_file',
  description:
    'Reads a text file from the workspace. Optionally returns only the first num_lines lines.',
  parameterSchema: {
    path: {
      type: 'string',
      required: true,
      description: 'File path relative to the workspace',
    },
    num_lines: {
      type: 'integer',
      required: false,
      description: 'Return only this many lines from the start of the file',
    },
  },
  requiresApproval: false,
};

export interface ReadFileDeps {
  resolver: SandboxPathResolver;
  outputLimit: number;
}

export function createReadFileHandler(deps: ReadFileDeps): ToolHandler {
  return async (args) => {
    const requested = stringArg(args, 'path');
    const numLines = optionalPositiveIntArg(args, 'num_lines');
    const target = deps.resolver.resolve(requested);

    const stats = await statIfExists(target);
    if (!stats) {
      throw new FileNotFoundError(requested);
    }
    if (!stats.isFile()) {
      throw new InvalidPathError(`Not a regular file: ${requested}`);
    }

    const content = await fs.readFile(target, 'utf8');
    const text =
      numLines === undefined ? content : content.split('\n').slice(0, numLines).join('\n');

    return { success: true, output: capOutput(text, deps.outputLimit) };
  };
}

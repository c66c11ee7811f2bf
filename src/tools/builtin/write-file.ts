import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ToolHandler, ToolSpec } from '../../types';
import { InvalidPathError } from '../../errors';
import { SandboxPathResolver } from '../../sandbox/path-resolver';
import { statIfExists } from '../fs-utils';
import { stringArg } from '../args';

export const WRITE_FILE_SPEC: ToolSpec = {
  name: 'write_file',
  description:
    'Writes content to a file in the workspace, creating parent directories and ' +
    'overwriting any existing file.',
  parameterSchema: {
    path: {
      type: 'string',
      required: true,
      description: 'File path relative to the workspace',
    },
    content: {
      type: 'string',
      required: true,
      description: 'The full content to write',
    },
  },
  requiresApproval: false,
};

export interface WriteFileDeps {
  resolver: SandboxPathResolver;
}

export function createWriteFileHandler(deps: WriteFileDeps): ToolHandler {
  return async (args) => {
    const requested = stringArg(args, 'path');
    const content = stringArg(args, 'content');
    const target = deps.resolver.resolve(requested);

    if (target === deps.resolver.root) {
      throw new InvalidPathError('Cannot write to the workspace root itself');
    }
    const existing = await statIfExists(target);
    if (existing?.isDirectory()) {
      throw new InvalidPathError(`Is a directory: ${requested}`);
    }

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, 'utf8');

    const bytes = Buffer.byteLength(content, 'utf8');
    return {
      success: true,
      output: `Wrote ${bytes} bytes to ${deps.resolver.relative(target)}`,
    };
  };
}

import { ToolRegistry } from '../registry';
import { ShellRunner } from '../shell-runner';
import { SandboxPathResolver } from '../../sandbox/path-resolver';
import { RUN_SHELL_SPEC, createRunShellHandler } from './run-shell';
import { READ_FILE_SPEC, createReadFileHandler } from './read-file';
import { WRITE_FILE_SPEC, createWriteFileHandler } from './write-file';

export { RUN_SHELL_SPEC, READ_FILE_SPEC, WRITE_FILE_SPEC };

export interface BuiltinToolDeps {
  resolver: SandboxPathResolver;
  shellRunner: ShellRunner;
  shellTimeoutMs: number;
  outputLimit: number;
}

/**
 * Register run_shell, read_file and write_file, all bound to the same
 * sandbox root
 */
export function registerBuiltinTools(registry: ToolRegistry, deps: BuiltinToolDeps): void {
  registry.register(
    RUN_SHELL_SPEC,
    createRunShellHandler({
      runner: deps.shellRunner,
      root: deps.resolver.root,
      timeoutMs: deps.shellTimeoutMs,
      outputLimit: deps.outputLimit,
    })
  );
  registry.register(
    READ_FILE_SPEC,
    createReadFileHandler({ resolver: deps.resolver, outputLimit: deps.outputLimit })
  );
  registry.register(WRITE_FILE_SPEC, createWriteFileHandler({ resolver: deps.resolver }));
}

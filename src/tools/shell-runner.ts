import { spawn } from 'node:child_process';
import { errorMessage, hasErrorCode } from '../errors';
import { createLogger } from '../observability/logger';

const log = createLogger('Shell');

export interface ShellRunOptions {
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Characters kept per stream; the rest is counted and discarded */
  captureLimit?: number;
}

export interface ShellRunResult {
  stdout: string;
  stderr: string;
  /** Null when the process was terminated by a signal */
  exitCode: number | null;
  timedOut: boolean;
  aborted: boolean;
  /** Characters seen on stdout and stderr beyond the capture limit */
  droppedChars: number;
}

/**
 * The OS command primitive used by `run_shell`
 */
export interface ShellRunner {
  run(command: string, options: ShellRunOptions): Promise<ShellRunResult>;
}

/** Grace period between SIGTERM and SIGKILL */
const KILL_GRACE_MS = 2000;

const DEFAULT_CAPTURE_LIMIT = 1_000_000;

/** Keeps the first `limit` characters of a stream and counts the rest */
class CappedCapture {
  text = '';
  dropped = 0;

  constructor(private readonly limit: number) {}

  push(chunk: string): void {
    const room = this.limit - this.text.length;
    if (room <= 0) {
      this.dropped += chunk.length;
      return;
    }
    if (chunk.length <= room) {
      this.text += chunk;
      return;
    }
    this.text += chunk.slice(0, room);
    this.dropped += chunk.length - room;
  }
}

/**
 * Runs commands through the system shell in their own process group, so a
 * timeout or cancellation takes down everything the command started.
 */
export class ChildProcessShellRunner implements ShellRunner {
  run(command: string, options: ShellRunOptions): Promise<ShellRunResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        cwd: options.cwd,
        shell: true,
        detached: process.platform !== 'win32',
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const captureLimit = options.captureLimit ?? DEFAULT_CAPTURE_LIMIT;
      const stdout = new CappedCapture(captureLimit);
      const stderr = new CappedCapture(captureLimit);
      let timedOut = false;
      let aborted = false;
      let killTimer: NodeJS.Timeout | undefined;

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => stdout.push(chunk));
      child.stderr.on('data', (chunk: string) => stderr.push(chunk));

      const terminate = () => {
        killGroup(child.pid, 'SIGTERM');
        killTimer = setTimeout(() => killGroup(child.pid, 'SIGKILL'), KILL_GRACE_MS);
        killTimer.unref();
      };

      const timeout = setTimeout(() => {
        timedOut = true;
        terminate();
      }, options.timeoutMs);

      const onAbort = () => {
        aborted = true;
        terminate();
      };
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      const cleanup = () => {
        clearTimeout(timeout);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.on('error', (error) => {
        cleanup();
        reject(error);
      });

      child.on('close', (code) => {
        cleanup();
        resolve({
          stdout: stdout.text,
          stderr: stderr.text,
          exitCode: code,
          timedOut,
          aborted,
          droppedChars: stdout.dropped + stderr.dropped,
        });
      });
    });
  }
}

function killGroup(pid: number | undefined, signal: NodeJS.Signals): void {
  if (pid === undefined) return;
  try {
    process.kill(process.platform === 'win32' ? pid : -pid, signal);
  } catch (error) {
    // ESRCH: the process group already exited
    if (!hasErrorCode(error, 'ESRCH')) {
      log.warn(`Failed to send ${signal} to process group ${pid}:`, errorMessage(error));
    }
  }
}

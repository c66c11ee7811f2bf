/**
 * Tagged console logging.
 *
 * Everything goes to stderr so diagnostics never interleave with the
 * conversation on stdout. Debug lines are dropped unless
 * SANDBOX_AGENT_DEBUG=1.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function isDebugEnabled(): boolean {
  return process.env.SANDBOX_AGENT_DEBUG === '1';
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => {
      if (isDebugEnabled()) console.error(prefix, message, ...details);
    },
    info: (message, ...details) => console.error(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
}

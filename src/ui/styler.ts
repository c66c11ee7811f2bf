import pc from 'picocolors';

export type Styler = {
  enabled: boolean;
  dim: (s: string) => string;
  bold: (s: string) => string;
  red: (s: string) => string;
  yellow: (s: string) => string;
  green: (s: string) => string;
  cyan: (s: string) => string;
};

/**
 * Colour is on for a TTY unless NO_COLOR is set; FORCE_COLOR overrides the
 * TTY check either way.
 */
export function colorEnabled(
  stream: { isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if ('NO_COLOR' in env) return false;
  if (env.FORCE_COLOR === '0') return false;
  if (env.FORCE_COLOR) return true;
  return stream.isTTY === true;
}

export function makeStyler(enabled: boolean): Styler {
  const colors = pc.createColors(true);
  const wrap = (fn: (s: string) => string) => (s: string) => (enabled ? fn(s) : s);
  return {
    enabled,
    dim: wrap(colors.dim),
    bold: wrap(colors.bold),
    red: wrap(colors.red),
    yellow: wrap(colors.yellow),
    green: wrap(colors.green),
    cyan: wrap(colors.cyan),
  };
}

import { THINKING_LEVELS, ThinkingLevel } from '../types';

export const DEFAULT_THINKING_LEVEL: ThinkingLevel = 'AUTO';

export function isThinkingLevel(value: string): value is ThinkingLevel {
  return THINKING_LEVELS.some((level) => level === value);
}

/**
 * Parse a user-supplied thinking level, case-insensitively
 */
export function resolveThinkingLevel(value: string): ThinkingLevel {
  const normalized = value.trim().toUpperCase();
  if (!isThinkingLevel(normalized)) {
    throw new Error(
      `Unsupported thinking level "${value}". Must be one of: ${THINKING_LEVELS.join(', ')}`
    );
  }
  return normalized;
}

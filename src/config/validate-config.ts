import { THINKING_LEVELS } from '../types';
import { isThinkingLevel } from './thinking-level';

/**
 * Validates a parsed sandbox-agent.yaml
 */

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const STRING_KEYS = ['workspace', 'model'] as const;

/** Keys that must be positive integers */
const INTEGER_KEYS = [
  'max_tokens',
  'shell_timeout_ms',
  'approval_timeout_ms',
  'output_limit',
  'max_tool_rounds',
] as const;

export const KNOWN_KEYS: readonly string[] = [
  ...STRING_KEYS,
  ...INTEGER_KEYS,
  'thinking_level',
  'max_retries',
];

export function validateConfigYaml(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (raw === null || raw === undefined) {
    return { valid: true, errors };
  }
  if (!isRecord(raw)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be a mapping of keys to values' }],
    };
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.includes(key)) {
      errors.push({ path: key, message: `Unknown key "${key}"` });
    }
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value !== undefined && (typeof value !== 'string' || value.trim() === '')) {
      errors.push({ path: key, message: 'Must be a non-empty string' });
    }
  }

  for (const key of INTEGER_KEYS) {
    const value = raw[key];
    if (value !== undefined && !isPositiveInteger(value)) {
      errors.push({ path: key, message: 'Must be a positive integer' });
    }
  }

  const retries = raw.max_retries;
  if (
    retries !== undefined &&
    (typeof retries !== 'number' || !Number.isInteger(retries) || retries < 0)
  ) {
    errors.push({ path: 'max_retries', message: 'Must be a non-negative integer' });
  }

  const level = raw.thinking_level;
  if (level !== undefined && (typeof level !== 'string' || !isThinkingLevel(level.toUpperCase()))) {
    errors.push({
      path: 'thinking_level',
      message: `Invalid thinking level. Must be one of: ${THINKING_LEVELS.join(', ')}`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

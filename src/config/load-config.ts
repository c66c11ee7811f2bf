import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { AgentConfig } from '../types';
import { DEFAULT_THINKING_LEVEL, resolveThinkingLevel } from './thinking-level';
import { isRecord, validateConfigYaml } from './validate-config';

export const DEFAULT_CONFIG_FILE = 'sandbox-agent.yaml';

export const API_KEY_ENV = 'ANTHROPIC_API_KEY';

export const DEFAULTS = {
  workspace: './playground',
  model: 'claude-sonnet-4-20250514',
  maxTokens: 8192,
  shellTimeoutMs: 30_000,
  outputLimit: 8000,
  maxToolRounds: 20,
  maxRetries: 2,
} as const;

/**
 * Values given on the command line; they win over everything else
 */
export interface CliOverrides {
  config?: string;
  workspace?: string;
  model?: string;
  thinkingLevel?: string;
}

export interface LoadConfigOptions {
  cli?: CliOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Read and validate a YAML config file.
 *
 * @param configPath - File to read
 * @param required - Whether a missing file is an error (true when the path
 *   was given explicitly)
 * @returns The parsed mapping, or an empty one when an optional file is absent
 */
export function loadConfigFile(configPath: string, required: boolean): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return {};
  }

  const raw: unknown = yaml.parse(fs.readFileSync(configPath, 'utf8'));
  const result = validateConfigYaml(raw);
  if (!result.valid) {
    const details = result.errors.map((e) => `  ${e.path || '(root)'}: ${e.message}`).join('\n');
    throw new Error(`Invalid config in ${configPath}:\n${details}`);
  }
  return isRecord(raw) ? raw : {};
}

/**
 * Build the effective configuration.
 *
 * Precedence: CLI flags, then SANDBOX_AGENT_* environment variables, then
 * the YAML file, then defaults.
 */
export function loadAgentConfig(options: LoadConfigOptions = {}): AgentConfig {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const configPath = path.resolve(cwd, cli.config ?? DEFAULT_CONFIG_FILE);
  const file = loadConfigFile(configPath, cli.config !== undefined);

  const workspace =
    cli.workspace ??
    nonEmpty(env.SANDBOX_AGENT_WORKSPACE) ??
    stringValue(file.workspace) ??
    DEFAULTS.workspace;
  const thinkingLevel = cli.thinkingLevel ?? stringValue(file.thinking_level);

  const config: AgentConfig = {
    workspace: path.resolve(cwd, workspace),
    model:
      cli.model ?? nonEmpty(env.SANDBOX_AGENT_MODEL) ?? stringValue(file.model) ?? DEFAULTS.model,
    maxTokens: numberValue(file.max_tokens) ?? DEFAULTS.maxTokens,
    thinkingLevel:
      thinkingLevel === undefined ? DEFAULT_THINKING_LEVEL : resolveThinkingLevel(thinkingLevel),
    shellTimeoutMs: numberValue(file.shell_timeout_ms) ?? DEFAULTS.shellTimeoutMs,
    outputLimit: numberValue(file.output_limit) ?? DEFAULTS.outputLimit,
    maxToolRounds: numberValue(file.max_tool_rounds) ?? DEFAULTS.maxToolRounds,
    maxRetries: numberValue(file.max_retries) ?? DEFAULTS.maxRetries,
  };

  const approvalTimeoutMs = numberValue(file.approval_timeout_ms);
  if (approvalTimeoutMs !== undefined) {
    config.approvalTimeoutMs = approvalTimeoutMs;
  }
  return config;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

function stringValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function numberValue(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

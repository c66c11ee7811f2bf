#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'node:readline/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import { ThinkingLevel } from './types';
import { API_KEY_ENV, loadAgentConfig } from './config/load-config';
import { resolveThinkingLevel } from './config/thinking-level';
import { SandboxPathResolver } from './sandbox/path-resolver';
import { ToolRegistry } from './tools/registry';
import { ChildProcessShellRunner } from './tools/shell-runner';
import { registerBuiltinTools } from './tools/builtin';
import { SystemPromptBuilder } from './context/prompt-builder';
import { AnthropicModelClient } from './llm/anthropic-client';
import { ApprovalGate } from './hooks/approval-gate';
import { AgentLoop } from './orchestration/agent-loop';
import { TerminalPresenter } from './ui/terminal-presenter';
import { Repl } from './ui/repl';
import { Spinner } from './ui/spinner';
import { colorEnabled, makeStyler } from './ui/styler';
import { errorMessage } from './errors';
import {
  createLogger,
  initMetrics,
  initTelemetry,
  isLangfuseEnabled,
  shutdownLangfuse,
} from './observability';

const log = createLogger('Agent');

type CliOptions = {
  thinkingLevel?: ThinkingLevel;
  workspace?: string;
  model?: string;
  config?: string;
};

function parseThinkingLevel(value: string): ThinkingLevel {
  try {
    return resolveThinkingLevel(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

function buildProgram(): Command {
  return new Command()
    .name('sandbox-agent')
    .description('Terminal agent that plans with an LLM and acts inside a sandboxed workspace')
    .addOption(
      new Option(
        '--thinking-level <level>',
        'reasoning depth passed to the model: LOW, HIGH or AUTO (default: AUTO)'
      ).argParser(parseThinkingLevel)
    )
    .option('--workspace <dir>', 'directory the tools are confined to (default: ./playground)')
    .option('--model <name>', 'model to use')
    .option('--config <file>', 'YAML config file (default: ./sandbox-agent.yaml if present)');
}

/**
 * Main entry point for the sandbox agent
 */
async function main(argv: string[]): Promise<number> {
  const options = buildProgram().parse(argv).opts<CliOptions>();

  const config = loadAgentConfig({
    cli: {
      config: options.config,
      workspace: options.workspace,
      model: options.model,
      thinkingLevel: options.thinkingLevel,
    },
  });

  const apiKey = process.env[API_KEY_ENV];
  if (!apiKey) {
    console.error(`${API_KEY_ENV} environment variable is required`);
    return 1;
  }

  initTelemetry();
  initMetrics();
  if (isLangfuseEnabled()) {
    log.info('Langfuse tracing enabled');
  }

  // 1. Sandbox and tools
  const resolver = SandboxPathResolver.create(config.workspace);
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, {
    resolver,
    shellRunner: new ChildProcessShellRunner(),
    shellTimeoutMs: config.shellTimeoutMs,
    outputLimit: config.outputLimit,
  });
  log.debug(`Workspace: ${resolver.root}`);

  // 2. Model
  const promptBuilder = new SystemPromptBuilder(resolver.root);
  const client = new AnthropicModelClient({
    apiKey,
    model: config.model,
    maxTokens: config.maxTokens,
    maxRetries: config.maxRetries,
    systemPrompt: () => promptBuilder.build(registry.listSpecs()),
  });

  // 3. Terminal, approval gate and loop
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const styler = makeStyler(colorEnabled(process.stdout));
  const presenter = new TerminalPresenter(rl, styler, new Spinner(styler));
  const gate = new ApprovalGate(presenter, { timeoutMs: config.approvalTimeoutMs });
  const loop = new AgentLoop(client, registry, gate, presenter, {
    thinkingLevel: config.thinkingLevel,
    maxToolRounds: config.maxToolRounds,
  });

  let closed = false;
  rl.once('close', () => {
    closed = true;
  });
  process.once('SIGTERM', () => rl.close());

  try {
    await new Repl(rl, presenter, loop, styler).run({
      workspace: resolver.root,
      model: config.model,
      thinkingLevel: config.thinkingLevel,
    });
  } finally {
    if (!closed) rl.close();
    await shutdownLangfuse();
  }
  return 0;
}

main(process.argv).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(`Fatal error starting sandbox-agent: ${errorMessage(error)}`);
    process.exit(1);
  }
);

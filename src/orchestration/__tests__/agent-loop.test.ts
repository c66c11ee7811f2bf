import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { AgentLoop } from '../agent-loop';
import { ToolRegistry } from '../../tools/registry';
import { ShellRunOptions, ShellRunResult, ShellRunner } from '../../tools/shell-runner';
import { registerBuiltinTools } from '../../tools/builtin';
import { SandboxPathResolver } from '../../sandbox/path-resolver';
import { ApprovalGate } from '../../hooks/approval-gate';
import { ModelCallOptions, ModelClient } from '../../llm/model-client';
import { ModelUnavailableError } from '../../errors';
import {
  AgentState,
  ModelRequest,
  ModelResponse,
  ModelToolCallResponse,
  Presenter,
  Turn,
} from '../../types';

/**
 * Tests for the agent loop state machine
 *
 * The model and the shell are in-process fakes; file tools run against a
 * temporary workspace.
 */

type Step =
  | ModelResponse
  | Error
  | ((request: ModelRequest, options: ModelCallOptions) => Promise<ModelResponse>);

class ScriptedModel implements ModelClient {
  readonly model = 'test-model';
  requests: ModelRequest[] = [];

  constructor(private readonly steps: Step[]) {}

  async complete(request: ModelRequest, options: ModelCallOptions = {}): Promise<ModelResponse> {
    this.requests.push(request);
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('No scripted response left');
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(request, options);
    }
    return step;
  }
}

class FakeShellRunner implements ShellRunner {
  calls: Array<{ command: string; options: ShellRunOptions }> = [];
  onRun?: (options: ShellRunOptions) => Promise<ShellRunResult>;

  constructor(private readonly stdout = '') {}

  async run(command: string, options: ShellRunOptions): Promise<ShellRunResult> {
    this.calls.push({ command, options });
    if (this.onRun) {
      return this.onRun(options);
    }
    return {
      stdout: this.stdout,
      stderr: '',
      exitCode: 0,
      timedOut: false,
      aborted: false,
      droppedChars: 0,
    };
  }
}

type Decide = (signal: AbortSignal) => Promise<boolean>;

class RecordingPresenter implements Presenter {
  turns: Turn[] = [];
  errors: string[] = [];
  prompts: Array<{ toolName: string; args: Record<string, unknown> }> = [];

  constructor(public decide: Decide = async () => true) {}

  displayTurn(turn: Turn): void {
    this.turns.push(turn);
  }

  displayApprovalPrompt(
    toolName: string,
    args: Record<string, unknown>,
    signal: AbortSignal
  ): Promise<boolean> {
    this.prompts.push({ toolName, args });
    return this.decide(signal);
  }

  displayError(message: string): void {
    this.errors.push(message);
  }
}

// Resolves false once the prompt is dismissed
const waitForDismissal: Decide = (signal) =>
  new Promise((resolve) => signal.addEventListener('abort', () => resolve(false), { once: true }));

function toolCall(
  id: string,
  name: string,
  args: Record<string, unknown>,
  extra: Partial<ModelToolCallResponse> = {}
): ModelToolCallResponse {
  return { kind: 'tool_call', id, name, arguments: args, ...extra };
}

function text(value: string): ModelResponse {
  return { kind: 'text', text: value, usage: { inputTokens: 3, outputTokens: 2 } };
}

function expectRequestsAnswered(turns: Turn[]): void {
  turns.forEach((turn, index) => {
    if (turn.type !== 'tool_request') return;
    const results = turns.filter((t) => t.type === 'tool_result' && t.id === turn.id);
    expect(results).toHaveLength(1);
    expect(turns.indexOf(results[0])).toBeGreaterThan(index);
  });
}

describe('AgentLoop', () => {
  let base: string;
  let resolver: SandboxPathResolver;
  let shell: FakeShellRunner;
  let presenter: RecordingPresenter;
  let states: AgentState[];

  const makeLoop = (
    model: ModelClient,
    options: { maxToolRounds?: number; approvalTimeoutMs?: number } = {}
  ) => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry, {
      resolver,
      shellRunner: shell,
      shellTimeoutMs: 30_000,
      outputLimit: 8000,
    });
    const gate = new ApprovalGate(presenter, { timeoutMs: options.approvalTimeoutMs });
    return new AgentLoop(model, registry, gate, presenter, {
      thinkingLevel: 'AUTO',
      maxToolRounds: options.maxToolRounds ?? 20,
      onStateChange: (state) => states.push(state),
    });
  };

  beforeEach(() => {
    base = fs.mkdtempSync(path.join(os.tmpdir(), 'sandbox-agent-loop-'));
    resolver = SandboxPathResolver.create(path.join(base, 'workspace'));
    shell = new FakeShellRunner();
    presenter = new RecordingPresenter();
    states = [];
  });

  afterEach(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  describe('final text', () => {
    it('should answer directly and return to Idle', async () => {
      const model = new ScriptedModel([text('Hello!')]);
      const loop = makeLoop(model);

      const result = await loop.submitUserMessage('hi');

      expect(result).toEqual({ status: 'completed', text: 'Hello!' });
      expect(loop.turns).toEqual([
        { type: 'user_message', text: 'hi' },
        { type: 'assistant_text', text: 'Hello!' },
      ]);
      expect(states).toEqual(['AwaitingModel', 'Done', 'Idle']);
      expect(loop.state).toBe('Idle');
      expect(presenter.turns).toEqual(loop.turns);
    });

    it('should send the transcript, tool specs and thinking level to the model', async () => {
      const model = new ScriptedModel([text('Hello!')]);
      await makeLoop(model).submitUserMessage('hi');

      expect(model.requests).toHaveLength(1);
      expect(model.requests[0].transcript).toEqual([{ type: 'user_message', text: 'hi' }]);
      expect(model.requests[0].toolSpecs.map((spec) => spec.name)).toEqual([
        'run_shell',
        'read_file',
        'write_file',
      ]);
      expect(model.requests[0].thinkingLevel).toBe('AUTO');
    });
  });

  describe('tool calls', () => {
    it('should run an approved shell command inside the workspace', async () => {
      shell = new FakeShellRunner('./app.py\n./lib/util.py');
      const command = "find . -name '*.py'";
      const model = new ScriptedModel([
        toolCall('toolu_1', 'run_shell', { command }),
        text('Found app.py and lib/util.py'),
      ]);
      const loop = makeLoop(model);

      const result = await loop.submitUserMessage('list python files');

      expect(result).toEqual({ status: 'completed', text: 'Found app.py and lib/util.py' });
      expect(presenter.prompts).toEqual([{ toolName: 'run_shell', args: { command } }]);
      expect(shell.calls).toHaveLength(1);
      expect(shell.calls[0].command).toBe(command);
      expect(shell.calls[0].options.cwd).toBe(resolver.root);
      expect(states).toEqual([
        'AwaitingModel',
        'AwaitingApproval',
        'ExecutingTool',
        'AwaitingModel',
        'Done',
        'Idle',
      ]);
      expect(model.requests[1].transcript[2]).toEqual({
        type: 'tool_result',
        id: 'toolu_1',
        name: 'run_shell',
        output: './app.py\n./lib/util.py',
        ok: true,
      });
    });

    it('should write a file without asking for approval', async () => {
      const model = new ScriptedModel([
        toolCall('toolu_1', 'write_file', { path: 'app.py', content: 'X' }),
        text('Created app.py'),
      ]);

      const result = await makeLoop(model).submitUserMessage('create app.py with content X');

      expect(result.status).toBe('completed');
      expect(presenter.prompts).toEqual([]);
      expect(fs.readFileSync(path.join(resolver.root, 'app.py'), 'utf8')).toBe('X');
      expect(model.requests[1].transcript[2]).toEqual({
        type: 'tool_result',
        id: 'toolu_1',
        name: 'write_file',
        output: 'Wrote 1 bytes to app.py',
        ok: true,
      });
    });

    it('should report a sandbox escape to the model and touch nothing outside', async () => {
      const model = new ScriptedModel([
        toolCall('toolu_1', 'write_file', { path: '../../etc/passwd', content: 'x' }),
        text('I cannot write outside the workspace.'),
      ]);

      const result = await makeLoop(model).submitUserMessage('overwrite passwd');

      expect(result.status).toBe('completed');
      expect(model.requests[1].transcript[2]).toMatchObject({
        type: 'tool_result',
        id: 'toolu_1',
        ok: false,
        errorKind: 'SandboxEscape',
      });
      expect(fs.existsSync(path.resolve(resolver.root, '../../etc/passwd'))).toBe(false);
    });

    it('should not start a process when approval is denied', async () => {
      presenter.decide = async () => false;
      const model = new ScriptedModel([
        toolCall('toolu_1', 'run_shell', { command: 'rm -rf build' }),
        text('Understood, leaving build alone.'),
      ]);
      const loop = makeLoop(model);

      const result = await loop.submitUserMessage('clean the build');

      expect(result.status).toBe('completed');
      expect(presenter.prompts).toHaveLength(1);
      expect(shell.calls).toHaveLength(0);
      expect(loop.turns[2]).toEqual({
        type: 'tool_result',
        id: 'toolu_1',
        name: 'run_shell',
        output: 'denied by user',
        ok: false,
        errorKind: 'ApprovalDenied',
      });
      expect(states).toEqual(['AwaitingModel', 'AwaitingApproval', 'AwaitingModel', 'Done', 'Idle']);
    });

    it('should report an unknown tool as a failed result', async () => {
      const model = new ScriptedModel([
        toolCall('toolu_1', 'delete_everything', {}),
        text('That tool does not exist.'),
      ]);
      const loop = makeLoop(model);

      await loop.submitUserMessage('go');

      expect(presenter.prompts).toEqual([]);
      expect(loop.turns[2]).toEqual({
        type: 'tool_result',
        id: 'toolu_1',
        name: 'delete_everything',
        output: "Unknown tool 'delete_everything'",
        ok: false,
        errorKind: 'UnknownTool',
      });
    });

    it('should record the preamble and thinking with the tool request', async () => {
      const thinking = [{ type: 'thinking' as const, thinking: 'read it first', signature: 'sig' }];
      const model = new ScriptedModel([
        toolCall('toolu_1', 'read_file', { path: 'notes.txt' }, { preamble: 'Checking.', thinking }),
        text('No notes yet.'),
      ]);
      const loop = makeLoop(model);

      await loop.submitUserMessage('read my notes');

      expect(loop.turns.slice(1, 4)).toEqual([
        { type: 'assistant_text', text: 'Checking.' },
        {
          type: 'tool_request',
          id: 'toolu_1',
          name: 'read_file',
          arguments: { path: 'notes.txt' },
          thinking,
        },
        {
          type: 'tool_result',
          id: 'toolu_1',
          name: 'read_file',
          output: 'File not found: notes.txt',
          ok: false,
          errorKind: 'FileNotFound',
        },
      ]);
    });

    it('should answer every tool request exactly once', async () => {
      fs.writeFileSync(path.join(resolver.root, 'a.txt'), 'one\ntwo\n');
      const model = new ScriptedModel([
        toolCall('t1', 'read_file', { path: 'a.txt', num_lines: 1 }),
        toolCall('t2', 'run_shell', { command: 'wc -l a.txt' }),
        toolCall('t3', 'write_file', { path: 'out/b.txt', content: 'one' }),
        text('Done'),
      ]);
      const loop = makeLoop(model);

      await loop.submitUserMessage('copy the first line');

      const turns = loop.turns;
      expect(turns.filter((turn) => turn.type === 'tool_request')).toHaveLength(3);
      expectRequestsAnswered(turns);
      expect(fs.readFileSync(path.join(resolver.root, 'out', 'b.txt'), 'utf8')).toBe('one');
    });
  });

  describe('failures', () => {
    it('should roll back the exchange when the model is unavailable', async () => {
      const model = new ScriptedModel([
        text('First answer'),
        toolCall('toolu_1', 'write_file', { path: 'a.txt', content: 'a' }),
        new ModelUnavailableError('Model request failed: 529 overloaded'),
      ]);
      const loop = makeLoop(model);
      await loop.submitUserMessage('first');
      const before = loop.turns;
      states = [];

      const result = await loop.submitUserMessage('second');

      expect(result).toEqual({ status: 'failed', error: 'Model request failed: 529 overloaded' });
      expect(loop.turns).toEqual(before);
      expect(presenter.errors).toEqual(['Model request failed: 529 overloaded']);
      expect(states).toEqual(['AwaitingModel', 'ExecutingTool', 'AwaitingModel', 'Failed', 'Idle']);
      expect(loop.state).toBe('Idle');
    });

    it('should treat any model client error as unavailable', async () => {
      const model = new ScriptedModel([new Error('socket hang up')]);

      const result = await makeLoop(model).submitUserMessage('hi');

      expect(result).toEqual({ status: 'failed', error: 'Model request failed: socket hang up' });
    });

    it('should stop after the round limit and roll back', async () => {
      const model = new ScriptedModel([
        toolCall('t1', 'read_file', { path: 'a' }),
        toolCall('t2', 'read_file', { path: 'b' }),
        toolCall('t3', 'read_file', { path: 'c' }),
      ]);
      const loop = makeLoop(model, { maxToolRounds: 2 });

      const result = await loop.submitUserMessage('loop forever');

      expect(result).toEqual({
        status: 'failed',
        error: 'No final answer after 2 model calls; stopping this request',
      });
      expect(model.requests).toHaveLength(2);
      expect(loop.turns).toEqual([]);
    });

    it('should fail the tool call when approval times out', async () => {
      presenter.decide = waitForDismissal;
      const model = new ScriptedModel([
        toolCall('toolu_1', 'run_shell', { command: 'make' }),
        text('No decision, skipping the build.'),
      ]);
      const loop = makeLoop(model, { approvalTimeoutMs: 20 });

      const result = await loop.submitUserMessage('build it');

      expect(result.status).toBe('completed');
      expect(shell.calls).toHaveLength(0);
      expect(loop.turns[2]).toEqual({
        type: 'tool_result',
        id: 'toolu_1',
        name: 'run_shell',
        output: 'No approval decision for run_shell within 20 ms',
        ok: false,
        errorKind: 'HandlerTimeout',
      });
    });
  });

  describe('cancel', () => {
    it('should return false when nothing is running', () => {
      expect(makeLoop(new ScriptedModel([])).cancel()).toBe(false);
    });

    it('should dismiss a pending approval and roll back', async () => {
      let loop: AgentLoop | undefined;
      presenter.decide = (signal) => {
        setTimeout(() => loop?.cancel(), 0);
        return waitForDismissal(signal);
      };
      loop = makeLoop(
        new ScriptedModel([toolCall('toolu_1', 'run_shell', { command: 'sleep 100' })])
      );

      const result = await loop.submitUserMessage('wait a while');

      expect(result).toEqual({ status: 'cancelled', error: 'Cancelled by user' });
      expect(shell.calls).toHaveLength(0);
      expect(loop.turns).toEqual([]);
      expect(presenter.errors).toEqual(['Cancelled by user']);
      expect(loop.state).toBe('Idle');
    });

    it('should abort a running shell command', async () => {
      let loop: AgentLoop | undefined;
      shell.onRun = (options) =>
        new Promise((resolve) => {
          options.signal?.addEventListener(
            'abort',
            () =>
              resolve({
                stdout: '',
                stderr: '',
                exitCode: null,
                timedOut: false,
                aborted: true,
                droppedChars: 0,
              }),
            { once: true }
          );
          setTimeout(() => loop?.cancel(), 0);
        });
      const model = new ScriptedModel([toolCall('toolu_1', 'run_shell', { command: 'sleep 100' })]);
      loop = makeLoop(model);

      const result = await loop.submitUserMessage('wait a while');

      expect(result.status).toBe('cancelled');
      expect(shell.calls[0].options.signal?.aborted).toBe(true);
      expect(model.requests).toHaveLength(1);
      expect(loop.turns).toEqual([]);
    });

    it('should abort a pending model call', async () => {
      let loop: AgentLoop | undefined;
      const model = new ScriptedModel([
        (_request, options) =>
          new Promise<ModelResponse>((_resolve, reject) => {
            options.signal?.addEventListener('abort', () => reject(new Error('aborted')), {
              once: true,
            });
            setTimeout(() => loop?.cancel(), 0);
          }),
      ]);
      loop = makeLoop(model);

      const result = await loop.submitUserMessage('hi');

      expect(result.status).toBe('cancelled');
      expect(loop.turns).toEqual([]);
    });
  });

  describe('session', () => {
    it('should refuse a second message while one is running', async () => {
      let release: (response: ModelResponse) => void = () => undefined;
      const model = new ScriptedModel([
        () =>
          new Promise<ModelResponse>((resolve) => {
            release = resolve;
          }),
      ]);
      const loop = makeLoop(model);

      const first = loop.submitUserMessage('one');
      expect(loop.isBusy).toBe(true);
      await expect(loop.submitUserMessage('two')).rejects.toThrow(
        'An exchange is already in progress'
      );
      expect(() => loop.reset()).toThrow('Cannot reset while an exchange is in progress');

      release(text('done'));
      await first;
      expect(loop.isBusy).toBe(false);
    });

    it('should keep history across messages until reset', async () => {
      const model = new ScriptedModel([text('one'), text('two')]);
      const loop = makeLoop(model);

      await loop.submitUserMessage('first');
      await loop.submitUserMessage('second');
      expect(model.requests[1].transcript).toHaveLength(3);

      loop.reset();
      expect(loop.turns).toEqual([]);
    });
  });
});

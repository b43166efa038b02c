import { describe, it, expect } from 'vitest';
import { ExecutionEngine, buildChildEnv } from './ExecutionEngine';
import type { ProcessOutcome, ProcessSpawner, SpawnRequest } from './ProcessSpawner';
import { parseMarkdown } from '@parser/MarkdownParser';
import { resolveCommand } from '@interpreter/resolver/CommandResolver';
import { LanguageRegistry } from '@core/registry/LanguageRegistry';
import { NoCodeBlocksError, SpawnFailureError, UnregisteredLanguageError } from '@core/errors';
import { CODE_SLOT, NAME_SLOT, literal } from '@core/types/language';

class RecordingSpawner implements ProcessSpawner {
  readonly requests: SpawnRequest[] = [];

  constructor(private readonly outcomes: Array<ProcessOutcome | Error> = []) {}

  async run(request: SpawnRequest): Promise<ProcessOutcome> {
    this.requests.push(request);
    const next = this.outcomes.shift() ?? { exitCode: 0 };
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

function resolved(markdown: string, path: string[]) {
  return resolveCommand(parseMarkdown(markdown), path);
}

const TWO_BLOCKS = '# Ci\n```sh\nfirst\n```\n```sh\nsecond\n```\n';

describe('buildChildEnv', () => {
  it('should overlay bindings in order without touching the base', () => {
    const base = { PATH: '/bin', A: '0' };
    const env = buildChildEnv(base, [
      { key: 'A', value: '1' },
      { key: 'B', value: 'x' },
      { key: 'A', value: '2' }
    ]);

    expect(env).toEqual({ PATH: '/bin', A: '2', B: 'x' });
    expect(base).toEqual({ PATH: '/bin', A: '0' });
  });
});

describe('ExecutionEngine', () => {
  it('should spawn the interpreter with the expanded template', async () => {
    const spawner = new RecordingSpawner();
    const engine = new ExecutionEngine({ spawner, baseEnv: {} });
    const { node, envBindings } = resolved('# Greet\n\n```sh\necho hello\n```\n', ['Greet']);

    const report = await engine.execute(node, envBindings);

    expect(report).toEqual({ state: 'done', exitCode: 0, blocksRun: 1 });
    expect(spawner.requests).toEqual([
      { file: 'sh', argv: ['sh', '-euc', 'echo hello', '--'], env: {}, cwd: undefined }
    ]);
  });

  it('should append trailing arguments to every block', async () => {
    const spawner = new RecordingSpawner();
    const engine = new ExecutionEngine({ spawner, baseEnv: {} });
    const { node } = resolved(TWO_BLOCKS, ['ci']);

    await engine.execute(node, [], ['--fast', 'x y']);

    expect(spawner.requests.map(r => r.argv)).toEqual([
      ['sh', '-euc', 'first', '--', '--fast', 'x y'],
      ['sh', '-euc', 'second', '--', '--fast', 'x y']
    ]);
  });

  it('should stop at the first failing block', async () => {
    const spawner = new RecordingSpawner([{ exitCode: 4 }]);
    const engine = new ExecutionEngine({ spawner, baseEnv: {} });
    const { node } = resolved(TWO_BLOCKS, ['ci']);

    const report = await engine.execute(node, []);

    expect(report).toEqual({ state: 'failed', exitCode: 4, failedBlockIndex: 0, blocksRun: 1 });
    expect(spawner.requests).toHaveLength(1);
  });

  it('should report a failure in a later block with its index', async () => {
    const spawner = new RecordingSpawner([{ exitCode: 0 }, { exitCode: 143, signal: 'SIGTERM' }]);
    const engine = new ExecutionEngine({ spawner, baseEnv: {} });
    const { node } = resolved(TWO_BLOCKS, ['ci']);

    const report = await engine.execute(node, []);

    expect(report).toEqual({
      state: 'failed',
      exitCode: 143,
      failedBlockIndex: 1,
      blocksRun: 2,
      signal: 'SIGTERM'
    });
  });

  it('should pass inherited bindings in the child environment only', async () => {
    const spawner = new RecordingSpawner();
    const engine = new ExecutionEngine({ spawner, baseEnv: { MD_FILE: '/work/README.md' } });
    const { node, envBindings } = resolved(
      '| K | V |\n|---|---|\n| MDTASK_TEST_A | 1 |\n# Outer\n## Inner\n| K | V |\n| MDTASK_TEST_A | 2 |\n```sh\ntrue\n```\n',
      ['outer', 'inner']
    );

    await engine.execute(node, envBindings);

    expect(spawner.requests[0].env).toEqual({ MD_FILE: '/work/README.md', MDTASK_TEST_A: '2' });
    expect(process.env.MDTASK_TEST_A).toBeUndefined();
  });

  it('should refuse a node without code blocks', async () => {
    const spawner = new RecordingSpawner();
    const engine = new ExecutionEngine({ spawner });
    const { node } = resolved('# Docs\nJust prose.\n', ['docs']);

    await expect(engine.execute(node, [])).rejects.toBeInstanceOf(NoCodeBlocksError);
    expect(spawner.requests).toEqual([]);
  });

  it('should wrap a start failure with the executable name', async () => {
    const notFound = Object.assign(new Error('spawn sh ENOENT'), { code: 'ENOENT' });
    const engine = new ExecutionEngine({ spawner: new RecordingSpawner([notFound]) });
    const { node } = resolved(TWO_BLOCKS, ['ci']);

    const failure = engine.execute(node, []);

    await expect(failure).rejects.toBeInstanceOf(SpawnFailureError);
    await expect(failure).rejects.toMatchObject({
      exitCode: 127,
      message: "Failed to start 'sh': spawn sh ENOENT"
    });
  });

  it('should treat a language missing from its registry as an internal error', async () => {
    const engine = new ExecutionEngine({ registry: new LanguageRegistry({}), spawner: new RecordingSpawner() });
    const { node } = resolved(TWO_BLOCKS, ['ci']);

    await expect(engine.execute(node, [])).rejects.toBeInstanceOf(UnregisteredLanguageError);
  });
});

describe('ExecutionEngine with a real shell', () => {
  const engine = new ExecutionEngine();

  it('should expose table bindings to the child', async () => {
    const { node, envBindings } = resolved(
      '## Test\n| KEY | VALUE |\n|-----|-------|\n| GREETING | hi |\n```sh\n[ "$GREETING" = hi ]\n```\n',
      ['Test']
    );

    await expect(engine.execute(node, envBindings)).resolves.toEqual({ state: 'done', exitCode: 0, blocksRun: 1 });
  });

  it('should let a nested binding override an inherited one', async () => {
    const { node, envBindings } = resolved(
      '| K | V |\n|---|---|\n| A | 1 |\n# Outer\n| K | V |\n| A | 2 |\n```sh\ntest "$A" = 2\n```\n',
      ['outer']
    );

    const report = await engine.execute(node, envBindings);

    expect(report.exitCode).toBe(0);
  });

  it('should deliver trailing arguments as positional parameters', async () => {
    const { node } = resolved('# Args\n```sh\n[ "$1" = "a b" ] && [ "$#" -eq 2 ]\n```\n', ['args']);

    const report = await engine.execute(node, [], ['a b', 'c']);

    expect(report.state).toBe('done');
  });

  it('should return the exit status of the failing block', async () => {
    const { node } = resolved('# Fail\n```sh\nexit 3\n```\n```sh\nexit 0\n```\n', ['fail']);

    await expect(engine.execute(node, [])).resolves.toEqual({
      state: 'failed',
      exitCode: 3,
      failedBlockIndex: 0,
      blocksRun: 1
    });
  });

  it('should map a signal to 128 plus its number', async () => {
    const { node } = resolved('# Killed\n```sh\nkill -TERM $$\n```\n', ['killed']);

    const report = await engine.execute(node, []);

    expect(report).toEqual({
      state: 'failed',
      exitCode: 143,
      failedBlockIndex: 0,
      blocksRun: 1,
      signal: 'SIGTERM'
    });
  });

  it('should report a missing interpreter as command not found', async () => {
    const registry = LanguageRegistry.withOverrides({
      sh: { executable: 'mdtask-missing-interpreter', argv: [NAME_SLOT, literal('-c'), CODE_SLOT] }
    });
    const missing = new ExecutionEngine({ registry });
    const { node } = resolved('# Run\n```sh\ntrue\n```\n', ['run']);

    await expect(missing.execute(node, [])).rejects.toMatchObject({
      code: 'SPAWN_FAILED',
      exitCode: 127
    });
  });
});

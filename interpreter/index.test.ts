import { describe, it, expect } from 'vitest';
import { runDocument } from './index';
import type { ProcessOutcome, ProcessSpawner, SpawnRequest } from './engine/ProcessSpawner';
import { LanguageRegistry } from '@core/registry/LanguageRegistry';
import { HeadingNotFoundError } from '@core/errors';
import { CODE_SLOT, NAME_SLOT } from '@core/types/language';

class RecordingSpawner implements ProcessSpawner {
  readonly requests: SpawnRequest[] = [];

  async run(request: SpawnRequest): Promise<ProcessOutcome> {
    this.requests.push(request);
    return { exitCode: 0 };
  }
}

describe('runDocument', () => {
  it('should parse, resolve and run in one call', async () => {
    const spawner = new RecordingSpawner();

    const report = await runDocument('# Greet\n\n```sh\necho hello\n```\n', ['greet'], ['x'], { spawner, baseEnv: {} });

    expect(report).toEqual({ state: 'done', exitCode: 0, blocksRun: 1 });
    expect(spawner.requests[0].argv).toEqual(['sh', '-euc', 'echo hello', '--', 'x']);
  });

  it('should parse with the registry it runs with', async () => {
    const spawner = new RecordingSpawner();
    const registry = LanguageRegistry.withOverrides({ lua: { executable: 'lua', argv: [NAME_SLOT, CODE_SLOT] } });

    await runDocument('# Hi\n```lua\nprint(1)\n```\n', ['hi'], [], { spawner, registry });

    expect(spawner.requests.map(r => r.argv)).toEqual([['lua', 'print(1)']]);
  });

  it('should fail without starting anything for an unknown heading', async () => {
    const spawner = new RecordingSpawner();

    await expect(runDocument('# Greet\n```sh\ntrue\n```\n', ['Nope'], [], { spawner })).rejects.toBeInstanceOf(
      HeadingNotFoundError
    );
    expect(spawner.requests).toEqual([]);
  });
});

import type { CommandNode, EnvBinding } from '@core/types/tree';
import { defaultLanguageRegistry, expandTemplate, type LanguageRegistry } from '@core/registry/LanguageRegistry';
import { NoCodeBlocksError, SpawnFailureError, UnregisteredLanguageError } from '@core/errors';
import { ExitCode } from '@core/constants/exit-codes';
import { executorLogger as logger } from '@core/utils/logger';
import { ChildProcessSpawner, type ProcessOutcome, type ProcessSpawner } from './ProcessSpawner';

export type ExecutionReport =
  | { state: 'done'; exitCode: typeof ExitCode.Success; blocksRun: number }
  | {
      state: 'failed';
      exitCode: number;
      /** 0-based index of the block that failed; later blocks were not started */
      failedBlockIndex: number;
      blocksRun: number;
      signal?: NodeJS.Signals;
    };

export interface ExecutionEngineOptions {
  registry?: LanguageRegistry;
  spawner?: ProcessSpawner;
  /** Environment the bindings are layered on; defaults to the current process environment */
  baseEnv?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Overlay bindings on a copy of `baseEnv`, in order, so later bindings win
 */
export function buildChildEnv(
  baseEnv: NodeJS.ProcessEnv,
  bindings: readonly EnvBinding[]
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  for (const { key, value } of bindings) {
    env[key] = value;
  }
  return env;
}

/**
 * Runs a node's code blocks one after another, stopping at the first failure.
 * The process environment is never modified: each child gets an explicit copy.
 */
export class ExecutionEngine {
  private readonly registry: LanguageRegistry;
  private readonly spawner: ProcessSpawner;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly cwd?: string;

  constructor(options: ExecutionEngineOptions = {}) {
    this.registry = options.registry ?? defaultLanguageRegistry;
    this.spawner = options.spawner ?? new ChildProcessSpawner();
    this.baseEnv = options.baseEnv ?? process.env;
    this.cwd = options.cwd;
  }

  async execute(
    node: CommandNode,
    envBindings: readonly EnvBinding[],
    trailingArgs: readonly string[] = []
  ): Promise<ExecutionReport> {
    if (node.codeBlocks.length === 0) {
      throw new NoCodeBlocksError(node.name, node.line);
    }

    const env = buildChildEnv(this.baseEnv, envBindings);

    for (const [index, block] of node.codeBlocks.entries()) {
      const spec = this.registry.resolve(block.language);
      if (!spec) {
        throw new UnregisteredLanguageError(block.language);
      }

      const { file, argv } = expandTemplate(spec, block.source, trailingArgs);
      logger.debug('Running code block', {
        heading: node.name,
        block: index,
        line: block.line,
        language: block.language,
        file
      });

      let outcome: ProcessOutcome;
      try {
        outcome = await this.spawner.run({ file, argv, env, cwd: this.cwd });
      } catch (error) {
        throw new SpawnFailureError(file, argv, error);
      }

      if (outcome.exitCode !== ExitCode.Success || outcome.signal) {
        logger.debug('Code block failed', {
          heading: node.name,
          block: index,
          exitCode: outcome.exitCode,
          signal: outcome.signal
        });
        return {
          state: 'failed',
          exitCode: outcome.exitCode,
          failedBlockIndex: index,
          blocksRun: index + 1,
          signal: outcome.signal
        };
      }
    }

    return { state: 'done', exitCode: ExitCode.Success, blocksRun: node.codeBlocks.length };
  }
}

import { parseMarkdown } from '@parser/MarkdownParser';
import { defaultLanguageRegistry } from '@core/registry/LanguageRegistry';
import { resolveCommand } from './resolver/CommandResolver';
import { ExecutionEngine, type ExecutionEngineOptions, type ExecutionReport } from './engine/ExecutionEngine';

export type RunDocumentOptions = ExecutionEngineOptions;

/**
 * Main entry point: parse a document, resolve the heading path and run the matched node.
 * The same registry decides which blocks the parser keeps and how the engine runs them.
 */
export async function runDocument(
  text: string,
  headingPath: readonly string[],
  trailingArgs: readonly string[] = [],
  options: RunDocumentOptions = {}
): Promise<ExecutionReport> {
  const registry = options.registry ?? defaultLanguageRegistry;
  const tree = parseMarkdown(text, registry);
  const { node, envBindings } = resolveCommand(tree, headingPath);
  return new ExecutionEngine({ ...options, registry }).execute(node, envBindings, trailingArgs);
}

export { resolveCommand, findDescendant, type ResolvedCommand } from './resolver/CommandResolver';
export { ExecutionEngine, buildChildEnv, type ExecutionEngineOptions, type ExecutionReport } from './engine/ExecutionEngine';
export {
  ChildProcessSpawner,
  signalExitCode,
  type ProcessSpawner,
  type SpawnRequest,
  type ProcessOutcome
} from './engine/ProcessSpawner';

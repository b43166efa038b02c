/**
 * Public API of mdtask: markdown documents as runnable command trees.
 */
export { runDocument, type RunDocumentOptions } from '@interpreter/index';
export {
  resolveCommand,
  findDescendant,
  ExecutionEngine,
  buildChildEnv,
  ChildProcessSpawner,
  signalExitCode,
  type ResolvedCommand,
  type ExecutionEngineOptions,
  type ExecutionReport,
  type ProcessSpawner,
  type SpawnRequest,
  type ProcessOutcome
} from '@interpreter/index';
export { MarkdownParser, parseMarkdown } from '@parser/MarkdownParser';
export { DocumentTree, isRunnable } from '@core/tree/DocumentTree';
export { LanguageRegistry, defaultLanguageRegistry, expandTemplate } from '@core/registry/LanguageRegistry';
export { CODE_SLOT, NAME_SLOT, literal } from '@core/types/language';
export type { TemplateSlot, InterpreterSpec, Invocation } from '@core/types/language';
export type { CodeBlock, CommandNode, EnvBinding, NodeId } from '@core/types/tree';
export * from '@core/errors';
export { ExitCode } from '@core/constants/exit-codes';
export { renderTree, type TreePrinterOptions } from '@cli/interaction/TreePrinter';

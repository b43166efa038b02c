import type { DocumentTree } from '@core/tree/DocumentTree';
import type { CommandNode, EnvBinding } from '@core/types/tree';
import { HeadingNotFoundError } from '@core/errors';
import { resolverLogger as logger } from '@core/utils/logger';

export interface ResolvedCommand {
  node: CommandNode;
  /** Bindings from the root down to `node`; later entries win on key collision */
  envBindings: EnvBinding[];
}

const sameName = (node: CommandNode, segment: string): boolean =>
  node.name.toLowerCase() === segment.toLowerCase();

/**
 * Find the node named `segment` below `from`. Direct children are tried first, then
 * each child's subtree in child order, depth first.
 */
export function findDescendant(tree: DocumentTree, from: CommandNode, segment: string): CommandNode | undefined {
  const direct = from.children.find(child => sameName(child, segment));
  if (direct) {
    return direct;
  }

  for (const child of from.children) {
    for (const node of tree.walk(child)) {
      if (sameName(node, segment)) {
        return node;
      }
    }
  }
  return undefined;
}

/**
 * Resolve a heading path against the tree, collecting inherited environment bindings.
 * An empty path resolves to the root.
 */
export function resolveCommand(tree: DocumentTree, headingPath: readonly string[]): ResolvedCommand {
  let current = tree.root;

  for (const segment of headingPath) {
    const next = findDescendant(tree, current, segment);
    if (!next) {
      throw new HeadingNotFoundError(segment, headingPath);
    }
    if (next.parentId !== current.id) {
      logger.debug('Matched heading below the direct children', {
        segment,
        under: current.name,
        line: next.line
      });
    }
    current = next;
  }

  const envBindings = tree.lineage(current).flatMap(node => node.envBindings);
  logger.debug('Resolved heading path', {
    path: headingPath.join(' '),
    line: current.line,
    blocks: current.codeBlocks.length,
    bindings: envBindings.length
  });

  return { node: current, envBindings };
}

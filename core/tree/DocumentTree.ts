import {
  ROOT_ID,
  type CodeBlock,
  type CommandNode,
  type EnvBinding,
  type NodeId
} from '@core/types/tree';

/**
 * The parsed command tree. Nodes are owned by their parent's `children` list
 * and indexed by id; back-references go through `parentOf`.
 */
export class DocumentTree {
  readonly root: CommandNode;
  private readonly nodes: CommandNode[] = [];

  constructor() {
    this.root = this.register({
      id: ROOT_ID,
      level: 0,
      name: '',
      line: 0,
      parentId: null,
      codeBlocks: [],
      envBindings: [],
      children: []
    });
  }

  get size(): number {
    return this.nodes.length;
  }

  findById(id: NodeId): CommandNode | undefined {
    return this.nodes[id];
  }

  /**
   * Append a heading under `parent`. The caller picks a parent with a lower level.
   */
  addHeading(parent: CommandNode, level: number, name: string, line: number): CommandNode {
    if (level <= parent.level) {
      throw new RangeError(`Heading level ${level} cannot nest under level ${parent.level}`);
    }

    const node = this.register({
      id: this.nodes.length,
      level,
      name,
      line,
      parentId: parent.id,
      codeBlocks: [],
      envBindings: [],
      children: []
    });
    parent.children.push(node);
    return node;
  }

  addCodeBlock(node: CommandNode, block: CodeBlock): void {
    node.codeBlocks.push(block);
  }

  addEnvBinding(node: CommandNode, binding: EnvBinding): void {
    node.envBindings.push(binding);
  }

  /**
   * Set the description unless one was already captured
   */
  describe(node: CommandNode, text: string): boolean {
    if (node.description !== undefined) {
      return false;
    }
    node.description = text;
    return true;
  }

  parentOf(node: CommandNode): CommandNode | undefined {
    return node.parentId === null ? undefined : this.nodes[node.parentId];
  }

  /**
   * The chain from the root down to `node`, both included
   */
  lineage(node: CommandNode): CommandNode[] {
    const chain: CommandNode[] = [];
    for (let current: CommandNode | undefined = node; current; current = this.parentOf(current)) {
      chain.push(current);
    }
    return chain.reverse();
  }

  /**
   * Pre-order traversal in document order, starting at `from` (the root by default)
   */
  *walk(from: CommandNode = this.root): Generator<CommandNode> {
    const stack: CommandNode[] = [from];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push(node.children[i]);
      }
    }
  }

  private register(node: CommandNode): CommandNode {
    this.nodes.push(node);
    return node;
  }
}

/**
 * A node is runnable when it, or any node beneath it, owns a code block
 */
export function isRunnable(node: CommandNode): boolean {
  return node.codeBlocks.length > 0 || node.children.some(isRunnable);
}

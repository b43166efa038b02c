/**
 * A fenced code block in a registered language
 */
export interface CodeBlock {
  /** The fence's info string, trimmed */
  language: string;
  /** Text between the fences, without the final newline */
  source: string;
  /** 1-based line of the opening fence */
  line: number;
}

/**
 * A key/value pair taken from a two-column table row
 */
export interface EnvBinding {
  key: string;
  value: string;
}

export type NodeId = number;

/**
 * A heading of the document, or the synthetic root (level 0).
 * Children are owned; the parent is referenced by id only.
 */
export interface CommandNode {
  readonly id: NodeId;
  /** 1-6 for headings, 0 for the root */
  readonly level: number;
  readonly name: string;
  /** 1-based line of the heading, 0 for the root */
  readonly line: number;
  readonly parentId: NodeId | null;
  description?: string;
  readonly codeBlocks: CodeBlock[];
  readonly envBindings: EnvBinding[];
  readonly children: CommandNode[];
}

export const ROOT_ID: NodeId = 0;

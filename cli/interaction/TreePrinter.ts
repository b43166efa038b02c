import chalk from 'chalk';
import stringWidth from 'string-width';
import { isRunnable, type DocumentTree } from '@core/tree/DocumentTree';
import type { CommandNode } from '@core/types/tree';

export interface TreePrinterOptions {
  /** First line of the output, usually the document's file name */
  title?: string;
  /** Also list each node's bindings and code blocks */
  verbose?: boolean;
  /** Defaults to whether chalk detected colour support */
  color?: boolean;
}

const BRANCH = '├── ';
const LAST_BRANCH = '└── ';
const PIPE = '│   ';
const SPACE = '    ';
const GAP = '  ';

interface Row {
  node: CommandNode;
  /** Tree drawing plus the heading name, uncoloured */
  label: string;
  prefix: string;
  name: string;
  /** Drawing for lines below this row, before its children */
  continuation: string;
}

function collectRows(node: CommandNode, prefix: string, rows: Row[]): void {
  const visible = node.children.filter(isRunnable);
  visible.forEach((child, index) => {
    const last = index === visible.length - 1;
    const name = child.name.toLowerCase();
    const childPrefix = prefix + (last ? SPACE : PIPE);
    const hasChildren = child.children.some(isRunnable);

    rows.push({
      node: child,
      prefix: prefix + (last ? LAST_BRANCH : BRANCH),
      name,
      label: prefix + (last ? LAST_BRANCH : BRANCH) + name,
      continuation: childPrefix + (hasChildren ? '│' : '')
    });
    collectRows(child, childPrefix, rows);
  });
}

/**
 * Render the runnable part of the tree. Headings without code anywhere beneath them are left out.
 */
export function renderTree(tree: DocumentTree, options: TreePrinterOptions = {}): string {
  const paint = new chalk.Instance({ level: (options.color ?? chalk.supportsColor !== false) ? 1 : 0 });

  const rows: Row[] = [];
  collectRows(tree.root, '', rows);
  // Columns are counted in terminal cells, so wide characters take two
  const width = Math.max(0, ...rows.map(row => stringWidth(row.label)));

  const lines = [options.title ?? '(document)'];
  for (const row of rows) {
    const details = detailLines(row.node, options.verbose ?? false, paint);
    const head = row.prefix + paint.green(row.name);

    if (details.length === 0) {
      lines.push(head);
      continue;
    }

    lines.push(head + ' '.repeat(width - stringWidth(row.label)) + GAP + details[0]);
    for (const detail of details.slice(1)) {
      lines.push((row.continuation + ' '.repeat(width - stringWidth(row.continuation)) + GAP + detail).trimEnd());
    }
  }

  return lines.join('\n');
}

function detailLines(node: CommandNode, verbose: boolean, paint: chalk.Chalk): string[] {
  const details: string[] = [];

  if (node.description) {
    details.push(node.description);
  }

  if (verbose) {
    for (const { key, value } of node.envBindings) {
      details.push(paint.blue(`${key}=${value}`));
    }
    for (const block of node.codeBlocks) {
      details.push('```' + block.language);
      for (const line of block.source.split('\n')) {
        details.push(line);
      }
      details.push('```');
    }
  }

  return details;
}

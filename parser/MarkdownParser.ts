import { DocumentTree } from '@core/tree/DocumentTree';
import { defaultLanguageRegistry, type LanguageRegistry } from '@core/registry/LanguageRegistry';
import type { CommandNode } from '@core/types/tree';
import { parserLogger as logger } from '@core/utils/logger';
import {
  isAlignmentRow,
  isTableLine,
  matchFence,
  matchHeading,
  parseTableRow
} from './lines';

type ScanMode =
  | { kind: 'normal' }
  | { kind: 'code'; language: string; line: number; body: string[] }
  | { kind: 'table'; afterHeader: boolean };

const NORMAL: ScanMode = { kind: 'normal' };

/**
 * Single-pass, line-oriented scanner turning a markdown document into a command tree.
 *
 * Headings open nodes, fenced blocks in a registered language become code blocks of the
 * current node, table rows become its environment bindings and the first plain line its
 * description. Malformed input never throws: unknown constructs are skipped and logged.
 */
export class MarkdownParser {
  constructor(private readonly registry: LanguageRegistry = defaultLanguageRegistry) {}

  parse(text: string): DocumentTree {
    const tree = new DocumentTree();
    let current: CommandNode = tree.root;
    let mode: ScanMode = NORMAL;

    const lines = text.split('\n');
    // A trailing newline does not start another line
    if (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }

    for (const [index, rawLine] of lines.entries()) {
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
      const lineNumber = index + 1;

      if (mode.kind === 'code') {
        if (matchFence(line) !== null) {
          this.closeCodeBlock(tree, current, mode);
          mode = NORMAL;
        } else {
          mode.body.push(line);
        }
        continue;
      }

      const heading = matchHeading(line);
      if (heading) {
        let parent: CommandNode = current;
        while (parent.level >= heading.level) {
          const next = tree.parentOf(parent);
          if (!next) break;
          parent = next;
        }
        current = tree.addHeading(parent, heading.level, heading.name, lineNumber);
        mode = NORMAL;
        continue;
      }

      const language = matchFence(line);
      if (language !== null) {
        mode = { kind: 'code', language, line: lineNumber, body: [] };
        continue;
      }

      if (isTableLine(line)) {
        if (mode.kind !== 'table') {
          // The first row of a table is its header
          mode = { kind: 'table', afterHeader: true };
          continue;
        }
        if (mode.afterHeader) {
          mode.afterHeader = false;
          if (isAlignmentRow(line)) continue;
        }

        const row = parseTableRow(line);
        if (row.kind === 'binding') {
          tree.addEnvBinding(current, row.binding);
        } else if (row.reason === 'malformed') {
          logger.debug('Skipping table row without two cells', { line: lineNumber, text: line });
        }
        continue;
      }

      mode = NORMAL;
      const trimmed = line.trim();
      if (trimmed.length > 0) {
        tree.describe(current, trimmed);
      }
    }

    if (mode.kind === 'code') {
      logger.debug('Code fence left open at end of document', { line: mode.line, language: mode.language });
      this.closeCodeBlock(tree, current, mode);
    }

    return tree;
  }

  private closeCodeBlock(
    tree: DocumentTree,
    node: CommandNode,
    block: { language: string; line: number; body: string[] }
  ): void {
    if (block.language === '' || !this.registry.isSupported(block.language)) {
      logger.debug('Dropping code block in an unregistered language', {
        line: block.line,
        language: block.language
      });
      return;
    }

    tree.addCodeBlock(node, {
      language: block.language,
      source: block.body.join('\n').replace(/\n+$/, ''),
      line: block.line
    });
  }
}

export function parseMarkdown(text: string, registry?: LanguageRegistry): DocumentTree {
  return new MarkdownParser(registry).parse(text);
}

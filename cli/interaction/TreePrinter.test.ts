import { describe, it, expect } from 'vitest';
import { renderTree } from './TreePrinter';
import { parseMarkdown } from '@parser/MarkdownParser';

const DOCUMENT = [
  '# Build',
  'Compile everything.',
  '## Release',
  '```sh',
  'make release',
  '```',
  '## Debug',
  '```sh',
  'make debug',
  '```',
  '# Docs',
  'Only prose.',
  '# Test',
  '```sh',
  'npm test',
  '```',
  ''
].join('\n');

describe('renderTree', () => {
  it('should draw runnable headings with aligned descriptions', () => {
    const output = renderTree(parseMarkdown(DOCUMENT), { title: 'README.md', color: false });

    expect(output.split('\n')).toEqual([
      'README.md',
      '├── build        Compile everything.',
      '│   ├── release',
      '│   └── debug',
      '└── test'
    ]);
  });

  it('should align descriptions after wide characters by display width', () => {
    const tree = parseMarkdown('# 构建\n部署全部。\n```sh\nmake\n```\n# Go\nRun it.\n```sh\ngo run .\n```\n');

    expect(renderTree(tree, { color: false }).split('\n')).toEqual([
      '(document)',
      '├── 构建  部署全部。',
      '└── go    Run it.'
    ]);
  });

  it('should fall back to a placeholder title', () => {
    const output = renderTree(parseMarkdown('# Run\n```sh\ntrue\n```\n'), { color: false });

    expect(output).toBe('(document)\n└── run');
  });

  it('should list bindings and code blocks in verbose mode', () => {
    const tree = parseMarkdown(
      '| K | V |\n|---|---|\n| ROOT | 1 |\n# Greet\nSay hello.\n| K | V |\n| NAME | world |\n```sh\necho "hello $NAME"\n```\n'
    );
    const output = renderTree(tree, { verbose: true, color: false });
    const indent = ' '.repeat(10);

    expect(output.split('\n')).toEqual([
      '(document)',
      '└── greet  Say hello.',
      `${indent}NAME=world`,
      `${indent}\`\`\`sh`,
      `${indent}echo "hello $NAME"`,
      `${indent}\`\`\``
    ]);
  });

  it('should keep the branch line under a node that has children', () => {
    const tree = parseMarkdown('# Outer\nGroup.\n## Inner\n```sh\ntrue\n```\n');
    const output = renderTree(tree, { verbose: true, color: false });

    expect(output.split('\n')).toEqual([
      '(document)',
      '└── outer      Group.',
      '    └── inner  ```sh',
      `${' '.repeat(15)}true`,
      `${' '.repeat(15)}\`\`\``
    ]);
  });

  it('should print only the title for a document without code', () => {
    expect(renderTree(parseMarkdown('# Notes\nNothing to run.\n'), { title: 'notes.md', color: false })).toBe(
      'notes.md'
    );
  });

  it('should colour heading names when asked', () => {
    const output = renderTree(parseMarkdown('# Run\n```sh\ntrue\n```\n'), { color: true });

    expect(output).toBe('(document)\n└── \u001b[32mrun\u001b[39m');
  });
});

import chalk from 'chalk';

export interface HelpContext {
  programName: string;
  /** Fence tags that can be run, for the LANGUAGES section */
  languages: readonly string[];
  color?: boolean;
}

const INDENT = '    ';

export class HelpSystem {
  renderHelp(context: HelpContext): string {
    const paint = new chalk.Instance({ level: (context.color ?? chalk.supportsColor !== false) ? 1 : 0 });
    const { programName } = context;

    return [
      'Run markdown codeblocks by its heading.',
      '',
      paint.yellow('USAGE:'),
      `${INDENT}${programName} [--file FILE] [--verbose] <heading...> [-- <args...>]`,
      '',
      paint.yellow('FLAGS:'),
      `${INDENT}-h, --help        Show this help`,
      `${INDENT}-v, --verbose     Print more information`,
      `${INDENT}-V, --version     Print the version`,
      `${INDENT}-d, --debug       Log debug output to stderr`,
      '',
      paint.yellow('OPTIONS:'),
      `${INDENT}-f, --file        MarkDown file to use`,
      '',
      paint.yellow('LANGUAGES:'),
      `${INDENT}${context.languages.join(', ')}`,
      '',
      `Without a heading, ${programName} lists the commands of ${programName}.md, .${programName}.md or README.md,`,
      'searched from the current directory upward.'
    ].join('\n');
  }
}

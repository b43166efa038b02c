import {
  CODE_SLOT,
  NAME_SLOT,
  literal,
  type InterpreterSpec,
  type Invocation
} from '@core/types/language';

// Shells take the code with -c; the `--` that follows becomes $0, so trailing args land in $1...
const shell = (executable: string): InterpreterSpec => ({
  executable,
  argv: [NAME_SLOT, literal('-euc'), CODE_SLOT, literal('--')]
});

const withFlag = (executable: string, flag: string): InterpreterSpec => ({
  executable,
  argv: [NAME_SLOT, literal(flag), CODE_SLOT]
});

const DEFAULT_LANGUAGES: Record<string, InterpreterSpec> = {
  sh: shell('sh'),
  bash: shell('bash'),
  zsh: shell('zsh'),
  fish: shell('fish'),
  dash: shell('dash'),
  ksh: shell('ksh'),
  ash: shell('ash'),
  shell: shell('sh'),
  awk: { executable: 'awk', argv: [NAME_SLOT, CODE_SLOT] },
  js: withFlag('node', '-e'),
  javascript: withFlag('node', '-e'),
  py: withFlag('python', '-c'),
  python: withFlag('python', '-c'),
  rb: withFlag('ruby', '-e'),
  ruby: withFlag('ruby', '-e'),
  php: withFlag('php', '-r'),
  cmd: withFlag('cmd.exe', '/c'),
  batch: withFlag('cmd.exe', '/c'),
  powershell: withFlag('powershell.exe', '-c')
};

/**
 * Case-insensitive mapping from a fence's language tag to an interpreter invocation
 */
export class LanguageRegistry {
  private readonly specs = new Map<string, InterpreterSpec>();

  constructor(entries: Record<string, InterpreterSpec> = DEFAULT_LANGUAGES) {
    for (const [tag, spec] of Object.entries(entries)) {
      this.register(tag, spec);
    }
  }

  /**
   * The default table with `overrides` registered on top
   */
  static withOverrides(overrides: Record<string, InterpreterSpec> = {}): LanguageRegistry {
    const registry = new LanguageRegistry();
    for (const [tag, spec] of Object.entries(overrides)) {
      registry.register(tag, spec);
    }
    return registry;
  }

  register(tag: string, spec: InterpreterSpec): void {
    this.specs.set(tag.trim().toLowerCase(), spec);
  }

  resolve(tag: string): InterpreterSpec | undefined {
    return this.specs.get(tag.trim().toLowerCase());
  }

  isSupported(tag: string): boolean {
    return this.resolve(tag) !== undefined;
  }

  supportedLanguages(): string[] {
    return [...this.specs.keys()].sort();
  }
}

/**
 * Expand an interpreter template for one code block.
 * Trailing arguments follow the template verbatim.
 */
export function expandTemplate(
  spec: InterpreterSpec,
  source: string,
  trailingArgs: readonly string[] = []
): Invocation {
  const argv = spec.argv.map(slot => {
    switch (slot.kind) {
      case 'code':
        return source;
      case 'name':
        return spec.executable;
      case 'literal':
        return slot.value;
    }
  });

  return {
    file: spec.executable,
    argv: [...argv, ...trailingArgs]
  };
}

export const defaultLanguageRegistry = new LanguageRegistry();

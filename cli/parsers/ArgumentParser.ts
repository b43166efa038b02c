import { UsageError } from '@core/errors';

export interface CLIOptions {
  file?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
  debug: boolean;
  /** Heading names, outermost first */
  headingPath: string[];
  /** Everything after `--`, passed to every code block untouched */
  trailingArgs: string[];
}

const SEPARATOR = '--';

export class ArgumentParser {
  /**
   * Flags are read up to the first non-flag argument. The rest is the heading path,
   * split from the trailing arguments by the first `--`.
   */
  parseArgs(args: readonly string[]): CLIOptions {
    const options: CLIOptions = {
      verbose: false,
      help: false,
      version: false,
      debug: false,
      headingPath: [],
      trailingArgs: []
    };

    let i = 0;
    for (; i < args.length; i++) {
      const arg = args[i];
      if (arg === SEPARATOR || !arg.startsWith('-') || arg === '-') {
        break;
      }

      const [flag, inlineValue] = splitInlineValue(arg);
      switch (flag) {
        case '--help':
        case '-h':
          options.help = true;
          break;
        case '--verbose':
        case '-v':
          options.verbose = true;
          break;
        case '--version':
        case '-V':
          options.version = true;
          break;
        case '--debug':
        case '-d':
          options.debug = true;
          break;
        case '--file':
        case '-f': {
          const value = inlineValue ?? args[++i];
          if (value === undefined || value === '' || value === SEPARATOR) {
            throw new UsageError(`Option ${flag} requires a file path`);
          }
          options.file = value;
          break;
        }
        default:
          throw new UsageError(`Unknown flag: ${arg}`);
      }

      if (inlineValue !== undefined && flag !== '--file' && flag !== '-f') {
        throw new UsageError(`Flag ${flag} does not take a value`);
      }
    }

    const rest = args.slice(i);
    const separator = rest.indexOf(SEPARATOR);
    if (separator === -1) {
      options.headingPath = rest;
    } else {
      options.headingPath = rest.slice(0, separator);
      options.trailingArgs = rest.slice(separator + 1);
    }

    return options;
  }
}

function splitInlineValue(arg: string): [string, string | undefined] {
  if (!arg.startsWith('--')) {
    return [arg, undefined];
  }
  const equals = arg.indexOf('=');
  return equals === -1 ? [arg, undefined] : [arg.slice(0, equals), arg.slice(equals + 1)];
}

import chalk from 'chalk';
import { MdtaskError } from '@core/errors';
import { ExitCode } from '@core/constants/exit-codes';
import { cliLogger as logger } from '@core/utils/logger';

export interface ErrorHandlerOptions {
  programName?: string;
  /** Print stack traces */
  debug?: boolean;
  color?: boolean;
  /** Receives each output line; defaults to stderr */
  write?: (line: string) => void;
}

/**
 * Reports an error that ended the invocation and picks the exit status for it
 */
export class ErrorHandler {
  private readonly programName: string;
  private readonly debug: boolean;
  private readonly paint: chalk.Chalk;
  private readonly write: (line: string) => void;

  constructor(options: ErrorHandlerOptions = {}) {
    this.programName = options.programName ?? 'mdtask';
    this.debug = options.debug ?? false;
    this.paint = new chalk.Instance({ level: (options.color ?? chalk.supportsColor !== false) ? 1 : 0 });
    this.write = options.write ?? (line => console.error(line));
  }

  /**
   * @returns The exit status for the process
   */
  handleError(error: unknown): number {
    if (error instanceof MdtaskError) {
      logger.debug('Command failed', error.toJSON());
      this.report(error);
      return error.exitCode;
    }

    if (error instanceof Error) {
      logger.debug('An unexpected error occurred', { name: error.name, message: error.message });
      this.report(error);
      return ExitCode.Failure;
    }

    logger.debug('An unknown error occurred', { error: String(error) });
    this.write(this.paint.red(`${this.programName}: Unknown Error: ${String(error)}`));
    return ExitCode.Failure;
  }

  private report(error: Error): void {
    this.write(this.paint.red(`${this.programName}: ${error.message}`));

    const cause = error.cause;
    if (cause instanceof Error) {
      this.write(this.paint.red(`  Cause: ${cause.message}`));
    }

    if (this.debug && error.stack) {
      this.write(this.paint.gray(error.stack));
    }
  }
}

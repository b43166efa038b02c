import { MdtaskError, ErrorSeverity } from './MdtaskError';
import { ExitCode } from '@core/constants/exit-codes';

/**
 * The command line could not be parsed
 */
export class UsageError extends MdtaskError {
  constructor(reason: string) {
    super(reason, {
      code: 'USAGE',
      severity: ErrorSeverity.Fatal,
      exitCode: ExitCode.Usage
    });
  }
}

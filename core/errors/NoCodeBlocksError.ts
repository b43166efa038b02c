import { MdtaskError, ErrorSeverity } from './MdtaskError';
import { ExitCode } from '@core/constants/exit-codes';

export class NoCodeBlocksError extends MdtaskError {
  public readonly heading: string;

  constructor(heading: string, line?: number) {
    super(`No code blocks found under heading '${heading}'`, {
      code: 'NO_CODE_BLOCKS',
      severity: ErrorSeverity.Fatal,
      exitCode: ExitCode.NoCodeBlocks,
      details: { heading, line }
    });
    this.heading = heading;
  }
}

import { MdtaskError, ErrorSeverity } from './MdtaskError';
import { ExitCode } from '@core/constants/exit-codes';

export interface HeadingNotFoundDetails {
  segment: string;
  headingPath: string[];
  [key: string]: unknown;
}

/**
 * Raised when a segment of the requested heading path matches no heading in the searched subtree.
 */
export class HeadingNotFoundError extends MdtaskError {
  public readonly segment: string;

  constructor(segment: string, headingPath: readonly string[]) {
    const details: HeadingNotFoundDetails = { segment, headingPath: [...headingPath] };
    super(`Heading not found: ${segment}`, {
      code: 'HEADING_NOT_FOUND',
      severity: ErrorSeverity.Fatal,
      exitCode: ExitCode.HeadingNotFound,
      details
    });
    this.segment = segment;
  }
}

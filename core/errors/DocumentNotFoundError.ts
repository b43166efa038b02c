import { MdtaskError, ErrorSeverity } from './MdtaskError';
import { ExitCode } from '@core/constants/exit-codes';

export class DocumentNotFoundError extends MdtaskError {
  /**
   * @param searchedParents - false when a single explicit path was checked
   */
  constructor(names: readonly string[], startDirectory: string, searchedParents: boolean = true) {
    const where = searchedParents ? `${startDirectory} or any parent directory` : startDirectory;
    super(`${names.join(', ')} not found in ${where}`, {
      code: 'DOCUMENT_NOT_FOUND',
      severity: ErrorSeverity.Fatal,
      exitCode: ExitCode.DocumentNotFound,
      details: { names: [...names], startDirectory }
    });
  }
}

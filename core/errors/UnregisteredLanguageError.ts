import { MdtaskError, ErrorSeverity } from './MdtaskError';
import { ExitCode } from '@core/constants/exit-codes';

/**
 * A stored code block names a language the registry cannot resolve.
 * The parser only keeps blocks in registered languages, so this is an internal invariant violation.
 */
export class UnregisteredLanguageError extends MdtaskError {
  public readonly language: string;

  constructor(language: string) {
    super(`Internal error: no interpreter registered for language '${language}'`, {
      code: 'UNREGISTERED_LANGUAGE',
      severity: ErrorSeverity.Fatal,
      exitCode: ExitCode.InternalError,
      details: { language }
    });
    this.language = language;
  }
}

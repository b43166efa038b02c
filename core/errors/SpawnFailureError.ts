import { MdtaskError, ErrorSeverity } from './MdtaskError';
import { ExitCode } from '@core/constants/exit-codes';

export interface SpawnFailureDetails {
  executable: string;
  argv: string[];
  osCode?: string;
  [key: string]: unknown;
}

function osErrorCode(cause: unknown): string | undefined {
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * The interpreter process could not be started (missing executable, permission denied, fork failure).
 */
export class SpawnFailureError extends MdtaskError {
  public readonly executable: string;

  constructor(executable: string, argv: string[], cause: unknown) {
    const osCode = osErrorCode(cause);
    const reason = cause instanceof Error ? cause.message : String(cause);
    const details: SpawnFailureDetails = { executable, argv, osCode };
    super(`Failed to start '${executable}': ${reason}`, {
      code: 'SPAWN_FAILED',
      severity: ErrorSeverity.Fatal,
      exitCode: osCode === 'ENOENT' ? ExitCode.CommandNotFound : ExitCode.SpawnFailure,
      details,
      cause
    });
    this.executable = executable;
  }
}

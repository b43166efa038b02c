import { MdtaskError, ErrorSeverity } from './MdtaskError';
import { ExitCode } from '@core/constants/exit-codes';

export class ConfigError extends MdtaskError {
  public readonly configPath: string;

  constructor(configPath: string, reason: string, cause?: unknown) {
    super(`Invalid configuration in ${configPath}: ${reason}`, {
      code: 'INVALID_CONFIG',
      severity: ErrorSeverity.Fatal,
      exitCode: ExitCode.InvalidConfig,
      details: { configPath },
      cause
    });
    this.configPath = configPath;
  }
}

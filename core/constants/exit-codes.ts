/**
 * Process exit codes reported by the CLI. Child exit statuses are passed through unchanged;
 * these cover the failures that happen before or around a child process.
 */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  HeadingNotFound: 2,
  NoCodeBlocks: 3,
  Usage: 64, // EX_USAGE
  DocumentNotFound: 66, // EX_NOINPUT
  InternalError: 70, // EX_SOFTWARE
  InvalidConfig: 78, // EX_CONFIG
  SpawnFailure: 126,
  CommandNotFound: 127,
  // A child killed by signal N is reported as SignalBase + N, as shells do
  SignalBase: 128
} as const;

/**
 * Central export point for mdtask error types.
 */
export { MdtaskError, ErrorSeverity, type BaseErrorDetails, type MdtaskErrorOptions } from './MdtaskError';
export { HeadingNotFoundError, type HeadingNotFoundDetails } from './HeadingNotFoundError';
export { NoCodeBlocksError } from './NoCodeBlocksError';
export { SpawnFailureError, type SpawnFailureDetails } from './SpawnFailureError';
export { UnregisteredLanguageError } from './UnregisteredLanguageError';
export { DocumentNotFoundError } from './DocumentNotFoundError';
export { ConfigError } from './ConfigError';
export { UsageError } from './UsageError';

/**
 * Central export point for textblocks error types.
 */
export { BlocksError, ErrorSeverity } from './BlocksError';
export type { BaseErrorDetails, BlocksErrorOptions } from './BlocksError';
export { BlocksErrorCode } from './codes';
export { ConfigurationError } from './ConfigurationError';
export type { ConfigurationIssue, ConfigurationErrorDetails } from './ConfigurationError';
export { BlockResolutionError } from './BlockResolutionError';
export type { BlockResolutionErrorDetails } from './BlockResolutionError';
export { DocumentStoreError } from './DocumentStoreError';
export type { DocumentStoreErrorDetails } from './DocumentStoreError';
export { UninstallBlockedError } from './UninstallBlockedError';
export type { UninstallBlockedErrorDetails } from './UninstallBlockedError';

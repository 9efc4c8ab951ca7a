import { BlocksError, ErrorSeverity, type BaseErrorDetails } from '@core/errors/BlocksError';
import { BlocksErrorCode } from '@core/errors/codes';

export interface ConfigurationIssue {
  /** Dotted path of the offending setting, e.g. `grammar.splitChar` */
  path: string;
  message: string;
}

export interface ConfigurationErrorDetails extends BaseErrorDetails {
  issues: ConfigurationIssue[];
  filePath?: string;
}

/**
 * Raised when configuration is rejected at load or save time. Rendering with
 * an invalid grammar is never attempted.
 */
export class ConfigurationError extends BlocksError<ConfigurationErrorDetails> {
  constructor(message: string, details: ConfigurationErrorDetails, cause?: unknown) {
    const summary = details.issues.map(issue => `${issue.path}: ${issue.message}`).join('; ');
    super(summary ? `${message} (${summary})` : message, {
      code: BlocksErrorCode.CONFIG_INVALID,
      severity: ErrorSeverity.Fatal,
      details,
      cause
    });
  }
}

import { BlocksError, ErrorSeverity, type BaseErrorDetails } from '@core/errors/BlocksError';
import { BlocksErrorCode } from '@core/errors/codes';

export interface UninstallBlockedErrorDetails extends BaseErrorDetails {
  dependentFields: string[];
}

/**
 * Thrown when the engine is asked to uninstall while fields still have block
 * processing enabled.
 */
export class UninstallBlockedError extends BlocksError<UninstallBlockedErrorDetails> {
  constructor(dependentFields: string[]) {
    super(
      `Cannot uninstall textblocks: block processing is still enabled on ${dependentFields.join(', ')}`,
      {
        code: BlocksErrorCode.UNINSTALL_BLOCKED,
        severity: ErrorSeverity.Fatal,
        details: { dependentFields }
      }
    );
  }
}

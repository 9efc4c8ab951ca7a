import { BlocksError, ErrorSeverity, type BaseErrorDetails } from '@core/errors/BlocksError';
import { BlocksErrorCode } from '@core/errors/codes';

export interface BlockResolutionErrorDetails extends BaseErrorDetails {
  /** The sanitized block name being resolved */
  blockName: string;
  /** Which collaborator failed */
  stage: 'store' | 'template';
}

/**
 * A collaborator failed while a block was being looked up. Recoverable: the
 * substitution pass degrades the affected reference to an empty string.
 */
export class BlockResolutionError extends BlocksError<BlockResolutionErrorDetails> {
  constructor(message: string, details: BlockResolutionErrorDetails, cause?: unknown) {
    super(message, {
      code: BlocksErrorCode.BLOCK_RESOLUTION_FAILED,
      severity: ErrorSeverity.Recoverable,
      details,
      cause
    });
  }
}

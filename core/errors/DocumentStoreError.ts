import { BlocksError, ErrorSeverity, type BaseErrorDetails } from '@core/errors/BlocksError';
import { BlocksErrorCode } from '@core/errors/codes';

export interface DocumentStoreErrorDetails extends BaseErrorDetails {
  documentId?: string;
  filePath?: string;
  operation: 'load' | 'save' | 'query';
}

export class DocumentStoreError extends BlocksError<DocumentStoreErrorDetails> {
  constructor(message: string, details: DocumentStoreErrorDetails, cause?: unknown) {
    super(message, {
      code: BlocksErrorCode.STORE_FAILED,
      severity: ErrorSeverity.Recoverable,
      details,
      cause
    });
  }
}

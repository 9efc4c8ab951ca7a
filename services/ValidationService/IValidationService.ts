export interface ValidationResult {
  /** The text to persist; equal to the input when nothing changed */
  text: string;
  changed: boolean;
  /** Block names converted to the multi-value form */
  renamed: string[];
  /** One user-facing message per renamed block */
  warnings: string[];
}

/**
 * Keeps single-value block names unique across the corpus by converting
 * colliding definitions to the multi-value form before a save.
 */
export interface IValidationService {
  /**
   * @param documentId - the document being saved; it never collides with itself
   * @param fieldScope - fields searched for other definitions; empty means every block-enabled field
   */
  validate(documentId: string, fieldScope: string[], text: string): Promise<ValidationResult>;
}

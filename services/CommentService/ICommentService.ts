/**
 * Removes HTML comments, raw or entity-encoded, from rendered text.
 */
export interface ICommentService {
  /** Idempotent: stripping an already stripped text changes nothing. */
  stripComments(text: string): string;
}

import type { BlockLookup } from '@core/types/block';

/**
 * Replaces `show` references with resolved block content.
 */
export interface ISubstitutionService {
  /**
   * Every distinct reference is resolved once and all of its occurrences get
   * the same text. A lookup that rejects yields an empty string for that
   * reference only. Inserted content is not scanned again.
   */
  substitute(text: string, lookup: BlockLookup): Promise<string>;
}

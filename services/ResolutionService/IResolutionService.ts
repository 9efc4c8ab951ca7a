import type { ResolutionOptions, ResolvedBlock } from '@core/types/block';

/**
 * Looks up block definitions across the document corpus.
 */
export interface IResolutionService {
  /**
   * Resolve a block by name. Itemized results are lists of matches, every
   * other shape is the matches joined by newlines. Unknown names resolve to
   * an empty string (or an empty list).
   *
   * @throws {BlockResolutionError} when the store or a template override fails
   */
  resolve(name: string, options?: ResolutionOptions): Promise<ResolvedBlock>;
}

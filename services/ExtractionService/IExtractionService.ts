import type { BlockMap } from './BlockMap';

export interface ExtractionResult {
  blocks: BlockMap;
  /** The input with every definition replaced by its content, or the input itself when not stripping */
  text: string;
}

/**
 * Finds `start…stop` block definitions in a single document.
 */
export interface IExtractionService {
  /**
   * Never throws on malformed markers; unterminated definitions are left as
   * literal text.
   */
  extract(text: string, removeFromText: boolean): ExtractionResult;
}

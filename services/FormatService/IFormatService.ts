import type { RenderScope } from '@core/types/block';

/**
 * Per-render pipeline: strip definitions, resolve show references, strip
 * comments.
 */
export interface IFormatService {
  /**
   * Returns the text untouched when `scope` is already formatting, which
   * bounds recursion through template overrides. Block content inserted by
   * this call is not expanded again.
   */
  formatDocumentText(text: string, scope?: RenderScope): Promise<string>;

  createRenderScope(): RenderScope;
}

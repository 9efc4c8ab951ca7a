import type { RenderScope } from './block';

/**
 * Storage collaborator contracts. The engine reads corpus documents through
 * these interfaces and only writes back the document currently being saved.
 */

// A raw string, or one string per language code
export type FieldValue = string | Record<string, string>;

export interface CorpusDocument {
  readonly id: string;
  /** Per-document access check; applied even to documents found through a hidden-inclusive search */
  isViewable(): boolean | Promise<boolean>;
  getFieldValue(fieldName: string, language?: string): string | undefined;
  /** Every stored value of a field, across languages */
  getFieldValues(fieldName: string): string[];
  setFieldValue(fieldName: string, value: string, language?: string): void;
}

export interface DocumentSelector {
  fieldScope: string[];
  containsSubstring: string;
  // Include documents outside default listing visibility (unpublished, restricted)
  includeHidden: boolean;
  excludeIds?: string[];
}

export interface IDocumentStore {
  findFieldsByCapability(capability: string): Promise<string[]>;
  findDocuments(selector: DocumentSelector): Promise<CorpusDocument[]>;
}

/**
 * Active and default language for a render.
 */
export interface ILanguageContext {
  getCurrentLanguage(): string;
  getDefaultLanguage(): string;
}

/**
 * Optional per-block-name renderer. Resolves to undefined when no override
 * exists for the block.
 */
export interface ITemplateRenderer {
  render(blockName: string, value: string, context?: TemplateRenderContext): Promise<string | undefined>;
}

export interface TemplateRenderContext {
  language?: string;
  scope?: RenderScope;
}

/**
 * Receives user-facing warnings, e.g. collision rewrites during save.
 */
export interface IWarningReporter {
  warn(message: string, context?: Record<string, unknown>): void;
}

// Capability tag that marks a field as block-enabled
export const BLOCK_CAPABILITY = 'textblocks';

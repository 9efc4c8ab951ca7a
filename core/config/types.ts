/**
 * Configuration types for textblocks
 */

export interface TextblocksConfig {
  grammar?: Partial<GrammarConfig>;
  language?: LanguageConfig;
  templates?: TemplatesConfig;
  corpus?: CorpusConfig;
}

/**
 * The four words that make up every marker. Changing them after documents
 * already contain markers orphans the existing blocks.
 */
export interface GrammarConfig {
  startWord: string;
  stopWord: string;
  showWord: string;
  splitChar: string;
}

export interface LanguageConfig {
  default?: string;
  current?: string;
}

export interface TemplatesConfig {
  directory?: string;
  extension?: string;
}

export interface CorpusConfig {
  directory?: string;
  // Fields with block processing enabled
  fields?: string[];
}

// Runtime configuration after merging and defaulting
export interface ResolvedConfig {
  grammar: GrammarConfig;
  language: Required<LanguageConfig>;
  templates: Required<TemplatesConfig>;
  corpus: Required<CorpusConfig>;
}

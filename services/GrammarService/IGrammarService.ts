import type { GrammarConfig } from '@core/config/types';

/**
 * Named groups produced by the definition pattern.
 *
 * `startOpen`/`startClose` and `stopOpen`/`stopClose` are the markup tags
 * found around the start and stop markers; a tag is only part of the marker
 * when it appears on both sides of it.
 */
export interface DefinitionGroups {
  sep: string;
  name: string;
  content: string;
  startOpen?: string;
  startClose?: string;
  stopOpen?: string;
  stopClose?: string;
}

export interface ShowGroups {
  sep: string;
  name: string;
  open?: string;
  close?: string;
}

/**
 * Lexical conventions of the block markers and the patterns derived from them.
 */
export interface IGrammarService {
  getConfig(): GrammarConfig;

  /**
   * Replace the grammar. Rejects invalid words.
   * @throws {ConfigurationError}
   */
  configure(grammar: GrammarConfig): void;

  /** Global, case-insensitive, multi-line `start…stop` pattern. */
  getDefinitionPattern(): RegExp;

  /** Global, case-insensitive `show` pattern. */
  getShowPattern(): RegExp;

  /** Whole-token `start`/`stop` markers of one single-value block name. */
  getSingleMarkerPattern(name: string): RegExp;

  readDefinition(match: RegExpMatchArray): DefinitionGroups | undefined;
  readShow(match: RegExpMatchArray): ShowGroups | undefined;

  hasStartMarker(text: string): boolean;
  hasShowMarker(text: string): boolean;

  isMultiSeparator(sep: string): boolean;
  separator(multi: boolean): string;
  startTag(name: string, multi: boolean): string;
  sanitizeName(name: string): string;
}

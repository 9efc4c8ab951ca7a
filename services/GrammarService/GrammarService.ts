import type { GrammarConfig } from '@core/config/types';
import { DEFAULT_GRAMMAR, validateGrammar } from '@core/config/utils';
import { ConfigurationError } from '@core/errors/ConfigurationError';
import { grammarLogger as logger } from '@core/utils/logger';
import type { DefinitionGroups, IGrammarService, ShowGroups } from './IGrammarService';

// Inline and paragraph-level tags a rich editor wraps around a marker line
const CONTEXT_TAGS = '(?:p|div|span|strong|em|b|i|u|h[1-6]|li|pre|code)';
const OPEN_TAG = `<${CONTEXT_TAGS}(?:\\s[^>]*)?>`;
const CLOSE_TAG = `<\\/${CONTEXT_TAGS}\\s*>`;

// Zero-width: preceded by whitespace, a tag end, or the string start
const LEAD_BOUNDARY = '(?<![^\\s>])';
// Zero-width: followed by whitespace, a tag start, or the string end
const TRAIL_BOUNDARY = '(?![^\\s<])';

const NAME = '[A-Za-z0-9][A-Za-z0-9_]*';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\\/-]/g, '\\$&');
}

export class GrammarService implements IGrammarService {
  private grammar: GrammarConfig;
  private definitionSource?: string;
  private showSource?: string;

  constructor(grammar: GrammarConfig = DEFAULT_GRAMMAR) {
    this.grammar = GrammarService.checked(grammar);
  }

  getConfig(): GrammarConfig {
    return { ...this.grammar };
  }

  configure(grammar: GrammarConfig): void {
    this.grammar = GrammarService.checked(grammar);
    this.definitionSource = undefined;
    this.showSource = undefined;
    logger.info('Grammar reconfigured', { grammar: this.grammar });
  }

  getDefinitionPattern(): RegExp {
    if (!this.definitionSource) {
      const { startWord, stopWord } = this.grammar;
      const sep = this.sepPattern();
      this.definitionSource =
        `(?:(?<startOpen>${OPEN_TAG})|${LEAD_BOUNDARY})` +
        `${escapeRegExp(startWord)}(?<sep>${sep})(?<name>${NAME})` +
        `(?:(?<startClose>${CLOSE_TAG})|\\r?\\n|\\s|$)` +
        '(?<content>[\\s\\S]*?)' +
        // The start side may already have taken the only whitespace before the stop word
        `(?:(?<stopOpen>${OPEN_TAG})|\\r?\\n|\\s|^|(?<=\\s))` +
        `${escapeRegExp(stopWord)}\\k<sep>\\k<name>` +
        `(?:(?<stopClose>${CLOSE_TAG})|${TRAIL_BOUNDARY})`;
    }
    // A fresh instance per call: global patterns carry lastIndex state
    return new RegExp(this.definitionSource, 'gim');
  }

  getShowPattern(): RegExp {
    if (!this.showSource) {
      this.showSource =
        `(?:(?<open>${OPEN_TAG})|${LEAD_BOUNDARY})` +
        `${escapeRegExp(this.grammar.showWord)}(?<sep>${this.sepPattern()})(?<name>${NAME})` +
        `(?:(?<close>${CLOSE_TAG})|${TRAIL_BOUNDARY})`;
    }
    return new RegExp(this.showSource, 'gi');
  }

  getSingleMarkerPattern(name: string): RegExp {
    const { startWord, stopWord, splitChar } = this.grammar;
    return new RegExp(
      `${LEAD_BOUNDARY}(?<word>${escapeRegExp(startWord)}|${escapeRegExp(stopWord)})` +
      `${escapeRegExp(splitChar)}(?<name>${escapeRegExp(this.sanitizeName(name))})${TRAIL_BOUNDARY}`,
      'gi'
    );
  }

  readDefinition(match: RegExpMatchArray): DefinitionGroups | undefined {
    const groups = match.groups;
    if (!groups || groups.sep === undefined || groups.name === undefined || groups.content === undefined) {
      return undefined;
    }
    return {
      sep: groups.sep,
      name: groups.name,
      content: groups.content,
      startOpen: groups.startOpen,
      startClose: groups.startClose,
      stopOpen: groups.stopOpen,
      stopClose: groups.stopClose
    };
  }

  readShow(match: RegExpMatchArray): ShowGroups | undefined {
    const groups = match.groups;
    if (!groups || groups.sep === undefined || groups.name === undefined) {
      return undefined;
    }
    return { sep: groups.sep, name: groups.name, open: groups.open, close: groups.close };
  }

  hasStartMarker(text: string): boolean {
    return GrammarService.containsIgnoreCase(text, this.grammar.startWord + this.grammar.splitChar);
  }

  hasShowMarker(text: string): boolean {
    return GrammarService.containsIgnoreCase(text, this.grammar.showWord + this.grammar.splitChar);
  }

  isMultiSeparator(sep: string): boolean {
    return sep === this.separator(true);
  }

  separator(multi: boolean): string {
    return multi ? this.grammar.splitChar.repeat(2) : this.grammar.splitChar;
  }

  startTag(name: string, multi: boolean): string {
    return this.grammar.startWord + this.separator(multi) + name;
  }

  sanitizeName(name: string): string {
    return name.replace(/[^A-Za-z0-9_]/g, '');
  }

  private sepPattern(): string {
    const sep = escapeRegExp(this.grammar.splitChar);
    return `${sep}${sep}?`;
  }

  private static containsIgnoreCase(text: string, needle: string): boolean {
    return text.toLowerCase().includes(needle.toLowerCase());
  }

  private static checked(grammar: GrammarConfig): GrammarConfig {
    const issues = validateGrammar(grammar);
    if (issues.length > 0) {
      throw new ConfigurationError('Invalid marker grammar', { issues });
    }
    return { ...grammar };
  }
}

import type { GrammarConfig, ResolvedConfig, TextblocksConfig } from './types';
import type { ConfigurationIssue } from '@core/errors/ConfigurationError';
import { ConfigurationError } from '@core/errors/ConfigurationError';

export const DEFAULT_GRAMMAR: Readonly<GrammarConfig> = Object.freeze({
  startWord: 'start',
  stopWord: 'stop',
  showWord: 'show',
  splitChar: '_'
});

export const DEFAULT_CONFIG: Readonly<ResolvedConfig> = Object.freeze({
  grammar: DEFAULT_GRAMMAR,
  language: { default: 'en', current: 'en' },
  templates: { directory: 'templates', extension: '.liquid' },
  corpus: { directory: 'content', fields: ['body'] }
});

const WORD_PATTERN = /^[A-Za-z]+$/;
const LANGUAGE_PATTERN = /^[A-Za-z]{2,3}(?:[-_][A-Za-z0-9]{2,8})*$/;

/**
 * Fill every missing setting from the defaults.
 */
export function applyDefaults(config: TextblocksConfig): ResolvedConfig {
  return {
    grammar: { ...DEFAULT_GRAMMAR, ...config.grammar },
    language: {
      default: config.language?.default ?? DEFAULT_CONFIG.language.default,
      current: config.language?.current ?? config.language?.default ?? DEFAULT_CONFIG.language.current
    },
    templates: {
      directory: config.templates?.directory ?? DEFAULT_CONFIG.templates.directory,
      extension: config.templates?.extension ?? DEFAULT_CONFIG.templates.extension
    },
    corpus: {
      directory: config.corpus?.directory ?? DEFAULT_CONFIG.corpus.directory,
      fields: config.corpus?.fields ?? [...DEFAULT_CONFIG.corpus.fields]
    }
  };
}

/**
 * Check the marker words: non-empty letters only, mutually distinct, and a
 * single-character separator that cannot occur in a word, a block name, or
 * around markup.
 */
export function validateGrammar(grammar: GrammarConfig): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  const words: Array<[keyof GrammarConfig, string]> = [
    ['startWord', grammar.startWord],
    ['stopWord', grammar.stopWord],
    ['showWord', grammar.showWord]
  ];

  for (const [key, value] of words) {
    if (typeof value !== 'string' || value.length === 0) {
      issues.push({ path: `grammar.${key}`, message: 'must not be empty' });
    } else if (!WORD_PATTERN.test(value)) {
      issues.push({ path: `grammar.${key}`, message: `"${value}" may only contain letters` });
    }
  }

  const seen = new Map<string, keyof GrammarConfig>();
  for (const [key, value] of words) {
    if (typeof value !== 'string' || value.length === 0) continue;
    const lowered = value.toLowerCase();
    const previous = seen.get(lowered);
    if (previous) {
      issues.push({ path: `grammar.${key}`, message: `"${value}" is already used by grammar.${previous}` });
    } else {
      seen.set(lowered, key);
    }
  }

  const sep = grammar.splitChar;
  if (typeof sep !== 'string' || sep.length !== 1) {
    issues.push({ path: 'grammar.splitChar', message: 'must be exactly one character' });
  } else if (/[A-Za-z0-9\s<>]/.test(sep)) {
    issues.push({ path: 'grammar.splitChar', message: `"${sep}" may not be a letter, digit, whitespace, "<" or ">"` });
  }

  return issues;
}

export function validateConfig(config: ResolvedConfig): ConfigurationIssue[] {
  const issues = validateGrammar(config.grammar);

  for (const key of ['default', 'current'] as const) {
    const code: unknown = config.language[key];
    if (typeof code !== 'string' || !LANGUAGE_PATTERN.test(code)) {
      issues.push({ path: `language.${key}`, message: `"${String(code)}" is not a language code` });
    }
  }

  const extension: unknown = config.templates.extension;
  if (typeof extension !== 'string' || !extension.startsWith('.')) {
    issues.push({ path: 'templates.extension', message: 'must start with "."' });
  }

  const fields: unknown = config.corpus.fields;
  if (!Array.isArray(fields)) {
    issues.push({ path: 'corpus.fields', message: 'must be a list of field names' });
  } else if (fields.some(field => typeof field !== 'string' || field.trim() === '')) {
    issues.push({ path: 'corpus.fields', message: 'field names must not be empty' });
  }

  return issues;
}

/**
 * @throws {ConfigurationError} listing every issue found
 */
export function assertValidConfig(config: ResolvedConfig, filePath?: string): void {
  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid textblocks configuration', { issues, filePath });
  }
}

import { describe, it, expect } from 'vitest';
import { GrammarService, escapeRegExp } from './GrammarService';
import { DEFAULT_GRAMMAR } from '@core/config/utils';
import { ConfigurationError } from '@core/errors/ConfigurationError';

describe('GrammarService', () => {
  describe('configuration', () => {
    it('uses start/stop/show with an underscore by default', () => {
      const grammar = new GrammarService();
      expect(grammar.getConfig()).toEqual({
        startWord: 'start',
        stopWord: 'stop',
        showWord: 'show',
        splitChar: '_'
      });
    });

    it('rejects a separator that can occur around markup', () => {
      expect(() => new GrammarService({ ...DEFAULT_GRAMMAR, splitChar: '<' })).toThrow(ConfigurationError);
    });

    it('rejects marker words that only differ in case', () => {
      expect(() => new GrammarService({ ...DEFAULT_GRAMMAR, stopWord: 'START' })).toThrow(
        'Invalid marker grammar (grammar.stopWord: "START" is already used by grammar.startWord)'
      );
    });

    it('rebuilds its patterns after configure', () => {
      const grammar = new GrammarService();
      grammar.configure({ startWord: 'begin', stopWord: 'end', showWord: 'insert', splitChar: '-' });

      const match = 'begin-note\nKept\nend-note'.match(grammar.getDefinitionPattern());
      expect(match?.[0]).toBe('begin-note\nKept\nend-note');
      expect(grammar.hasShowMarker('insert-note')).toBe(true);
      expect(grammar.hasShowMarker('show_note')).toBe(false);
    });
  });

  describe('patterns', () => {
    it('returns a fresh global instance on every call', () => {
      const grammar = new GrammarService();
      const first = grammar.getDefinitionPattern();
      const second = grammar.getDefinitionPattern();

      expect(first).not.toBe(second);
      expect(first.source).toBe(second.source);
      expect(first.flags).toBe('gim');
      expect(grammar.getShowPattern().flags).toBe('gi');
    });

    it('reads the groups of a multi-value definition', () => {
      const grammar = new GrammarService();
      const [match] = Array.from('start__list\nA\nstop__list'.matchAll(grammar.getDefinitionPattern()));

      expect(grammar.readDefinition(match)).toEqual({
        sep: '__',
        name: 'list',
        content: 'A',
        startOpen: undefined,
        startClose: undefined,
        stopOpen: undefined,
        stopClose: undefined
      });
    });

    it('reads the wrapping tags of a show reference', () => {
      const grammar = new GrammarService();
      const [match] = Array.from('<p>show_intro</p>'.matchAll(grammar.getShowPattern()));

      expect(grammar.readShow(match)).toEqual({ sep: '_', name: 'intro', open: '<p>', close: '</p>' });
    });

    it('does not match a show word glued to other text', () => {
      const grammar = new GrammarService();
      expect(Array.from('noshow_intro show_intro!'.matchAll(grammar.getShowPattern()))).toHaveLength(0);
    });

    it('matches only the single-value markers of one name', () => {
      const grammar = new GrammarService();
      const text = 'start_greeting\nHi\nstop_greeting\nstart__greeting\nstop__greeting\nstart_greetings';
      const found = Array.from(text.matchAll(grammar.getSingleMarkerPattern('greeting')), match => match[0]);

      expect(found).toEqual(['start_greeting', 'stop_greeting']);
    });
  });

  describe('probes and tags', () => {
    it('detects start markers case-insensitively', () => {
      const grammar = new GrammarService();
      expect(grammar.hasStartMarker('Some START_intro')).toBe(true);
      expect(grammar.hasStartMarker('started here')).toBe(false);
    });

    it('builds start tags for both multiplicities', () => {
      const grammar = new GrammarService();
      expect(grammar.separator(false)).toBe('_');
      expect(grammar.separator(true)).toBe('__');
      expect(grammar.startTag('list', true)).toBe('start__list');
      expect(grammar.startTag('intro', false)).toBe('start_intro');
      expect(grammar.isMultiSeparator('__')).toBe(true);
      expect(grammar.isMultiSeparator('_')).toBe(false);
    });

    it('keeps only word characters in names', () => {
      const grammar = new GrammarService();
      expect(grammar.sanitizeName('he llo-!_1')).toBe('hello_1');
    });
  });

  it('escapes regular expression syntax', () => {
    expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
    expect(new RegExp(escapeRegExp('$-(x)')).test('$-(x)')).toBe(true);
  });
});

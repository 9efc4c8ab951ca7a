import { describe, it, expect, beforeEach } from 'vitest';
import { ExtractionService } from './ExtractionService';
import { GrammarService } from '@services/GrammarService/GrammarService';

describe('ExtractionService', () => {
  let service: ExtractionService;

  beforeEach(() => {
    service = new ExtractionService(new GrammarService());
  });

  describe('stripping definitions', () => {
    it('replaces a definition with its content', () => {
      const { blocks, text } = service.extract('start_x\nBody\nstop_x', true);

      expect(text).toBe('Body');
      expect(blocks.get('x', false)).toBe('Body');
    });

    it('keeps the text around a definition', () => {
      const { text } = service.extract('Intro\nstart_x\nBody\nstop_x\nOutro', true);
      expect(text).toBe('Intro\nBody\nOutro');
    });

    it('drops paragraph tags that wrap both markers', () => {
      const input = '<p>start_x</p>\n<p>Body</p>\n<p>stop_x</p>';
      const { blocks, text } = service.extract(input, true);

      expect(text).toBe('\n<p>Body</p>\n');
      expect(blocks.get('x', false)).toBe('\n<p>Body</p>\n');
    });

    it('keeps a tag that only wraps one side of a marker', () => {
      const { text } = service.extract('<p>start_x\nBody\nstop_x</p>', true);
      expect(text).toBe('<p>Body</p>');
    });

    it('leaves the text alone when not stripping', () => {
      const input = 'Intro\nstart_x\nBody\nstop_x';
      const { blocks, text } = service.extract(input, false);

      expect(text).toBe(input);
      expect(blocks.get('x', false)).toBe('Body');
    });
  });

  describe('matching', () => {
    it('accepts an empty block on one line with a single space', () => {
      const { blocks, text } = service.extract('a start_x stop_x b', true);

      expect(blocks.toRecord()).toEqual({ x: '' });
      expect(text).toBe('a  b');
    });

    it('needs whitespace between marker and content', () => {
      const { blocks, text } = service.extract('start_xBody stop_x', true);

      expect(blocks.size).toBe(0);
      expect(text).toBe('start_xBody stop_x');
    });

    it('leaves unterminated definitions as literal text', () => {
      const { blocks, text } = service.extract('start_x\nBody', true);

      expect(blocks.size).toBe(0);
      expect(text).toBe('start_x\nBody');
    });

    it('requires the stop marker to repeat the name', () => {
      const { blocks } = service.extract('start_a\nX\nstop_b', false);
      expect(blocks.size).toBe(0);
    });

    it('matches marker words and names case-insensitively', () => {
      const { blocks } = service.extract('START_Intro\nHi\nstop_INTRO', false);

      expect(blocks.get('intro', false)).toBe('Hi');
      expect(blocks.values()[0].name).toBe('Intro');
    });

    it('skips the work when no start marker is present', () => {
      const input = 'Nothing to see';
      expect(service.extract(input, true)).toEqual({ blocks: expect.anything(), text: input });
    });
  });

  describe('insertion policy', () => {
    it('keeps the first definition of a single-value name', () => {
      const { blocks, text } = service.extract('start_a\none\nstop_a\nstart_a\ntwo\nstop_a', true);

      expect(blocks.toRecord()).toEqual({ a: 'one' });
      expect(text).toBe('one\ntwo');
    });

    it('appends every definition of a multi-value name', () => {
      const { blocks } = service.extract('start__list\nA\nstop__list\nstart__list\nB\nstop__list', false);

      expect(blocks.get('list', true)).toBe('A\nB');
      expect(blocks.toRecord()).toEqual({ list_: 'A\nB' });
    });

    it('keeps single and multi entries of one name apart', () => {
      const { blocks } = service.extract('start_x\nS\nstop_x\nstart__x\nM\nstop__x', false);
      expect(blocks.toRecord()).toEqual({ x: 'S', x_: 'M' });
    });
  });
});

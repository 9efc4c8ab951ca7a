import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  BlockEngine,
  CollectingWarningReporter,
  ConfigurationError,
  MemoryDocumentStore,
  StaticLanguageContext,
  UninstallBlockedError,
  createBlockEngine
} from './index';

describe('BlockEngine', () => {
  let store: MemoryDocumentStore;
  let reporter: CollectingWarningReporter;
  let engine: BlockEngine;

  beforeEach(() => {
    store = new MemoryDocumentStore({
      fields: ['body'],
      documents: [
        { id: 'library', fields: { body: 'start_hello\nHello, world!\nstop_hello\nstart__faq\nQ1\nstop__faq' } },
        { id: 'help', fields: { body: 'start__faq\nQ2\nstop__faq' } }
      ]
    });
    reporter = new CollectingWarningReporter();
    engine = new BlockEngine({ store, reporter });
  });

  it('formats a document for display', async () => {
    await expect(
      engine.formatDocumentText('<p>show_hello</p>\n<!-- draft -->\nshow__faq')
    ).resolves.toBe('Hello, world!\n\nQ1\nQ2');
  });

  it('looks up single and multi-value blocks', async () => {
    await expect(engine.getBlock('hello')).resolves.toBe('Hello, world!');
    await expect(engine.getMultiBlock('faq', { resultShape: 'itemized' })).resolves.toEqual(['Q1', 'Q2']);
    await expect(engine.getBlock('faq', { multiplicity: 'multi' })).resolves.toBe('Q1\nQ2');
  });

  it('extracts the blocks of one text', () => {
    expect(engine.extractBlocks('start_a\nA\nstop_a\nstart__b\nB\nstop__b')).toEqual({ a: 'A', b_: 'B' });
  });

  it('strips comments', () => {
    expect(engine.stripComments('a<!-- b -->c')).toBe('ac');
  });

  describe('beforeSave', () => {
    const draft = 'start_hello\nHi!\nstop_hello';

    it('converts colliding names and reports the change', async () => {
      const result = await engine.beforeSave('page', ['body'], draft);

      expect(result.text).toBe('start__hello\nHi!\nstop__hello');
      expect(reporter.drain()).toEqual([
        'The block name "hello" is already used in another document, so "start_hello" was changed to "start__hello".'
      ]);
    });

    it('skips validation when the value did not change', async () => {
      const findDocuments = vi.spyOn(store, 'findDocuments');
      const result = await engine.beforeSave('page', ['body'], draft, draft);

      expect(result).toEqual({ text: draft, changed: false, renamed: [], warnings: [] });
      expect(findDocuments).not.toHaveBeenCalled();
    });
  });

  it('renders in the language of its context', async () => {
    store.add({ id: 'intl', fields: { body: { en: 'start_bye\nBye\nstop_bye', de: 'start_bye\nTschüss\nstop_bye' } } });
    const german = new BlockEngine({ store, language: new StaticLanguageContext('de', 'en') });

    await expect(german.formatDocumentText('show_bye')).resolves.toBe('Tschüss');
    await expect(engine.formatDocumentText('show_bye')).resolves.toBe('Bye');
  });

  it('follows a custom grammar', async () => {
    store.add({ id: 'custom', fields: { body: 'begin.note\nCustom\nend.note' } });
    const custom = new BlockEngine({
      store,
      config: { grammar: { startWord: 'begin', stopWord: 'end', showWord: 'insert', splitChar: '.' } }
    });

    await expect(custom.formatDocumentText('insert.note')).resolves.toBe('Custom');
  });

  it('rejects an invalid configuration up front', () => {
    expect(() => new BlockEngine({ store, config: { grammar: { splitChar: '' } } })).toThrow(ConfigurationError);
  });

  it('refuses to uninstall while fields still use blocks', async () => {
    await expect(engine.assertCanUninstall()).rejects.toThrow(UninstallBlockedError);

    store.disableField('body');
    await expect(engine.assertCanUninstall()).resolves.toBeUndefined();
  });
});

describe('createBlockEngine', () => {
  it('uses the configuration it is given', () => {
    const engine = createBlockEngine({
      store: new MemoryDocumentStore(),
      config: { language: { default: 'fr' } }
    });
    expect(engine.config.language).toEqual({ default: 'fr', current: 'fr' });
  });
});

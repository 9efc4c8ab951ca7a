import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader, PROJECT_CONFIG_FILE } from './loader';
import { DEFAULT_CONFIG, DEFAULT_GRAMMAR, applyDefaults, validateConfig, validateGrammar } from './utils';
import { ConfigurationError } from '@core/errors/ConfigurationError';

describe('Configuration System', () => {
  describe('Grammar validation', () => {
    it('accepts the default grammar', () => {
      expect(validateGrammar(DEFAULT_GRAMMAR)).toEqual([]);
    });

    it('rejects empty and non-letter words', () => {
      expect(validateGrammar({ ...DEFAULT_GRAMMAR, startWord: '', showWord: 'sh0w' })).toEqual([
        { path: 'grammar.startWord', message: 'must not be empty' },
        { path: 'grammar.showWord', message: '"sh0w" may only contain letters' }
      ]);
    });

    it('rejects words used twice', () => {
      expect(validateGrammar({ ...DEFAULT_GRAMMAR, showWord: 'Stop' })).toEqual([
        { path: 'grammar.showWord', message: '"Stop" is already used by grammar.stopWord' }
      ]);
    });

    it('needs a single separator character that cannot appear in names', () => {
      expect(validateGrammar({ ...DEFAULT_GRAMMAR, splitChar: '__' })).toEqual([
        { path: 'grammar.splitChar', message: 'must be exactly one character' }
      ]);
      expect(validateGrammar({ ...DEFAULT_GRAMMAR, splitChar: '7' })).toEqual([
        { path: 'grammar.splitChar', message: '"7" may not be a letter, digit, whitespace, "<" or ">"' }
      ]);
      expect(validateGrammar({ ...DEFAULT_GRAMMAR, splitChar: '.' })).toEqual([]);
    });
  });

  describe('Defaults', () => {
    it('fills every section', () => {
      expect(applyDefaults({})).toEqual(DEFAULT_CONFIG);
    });

    it('uses the default language as the current one unless set', () => {
      expect(applyDefaults({ language: { default: 'de' } }).language).toEqual({ default: 'de', current: 'de' });
      expect(applyDefaults({ language: { default: 'de', current: 'fr' } }).language).toEqual({
        default: 'de',
        current: 'fr'
      });
    });

    it('validates language codes and template extensions', () => {
      const config = applyDefaults({ language: { default: 'english' }, templates: { extension: 'liquid' } });
      expect(validateConfig(config)).toEqual([
        { path: 'language.default', message: '"english" is not a language code' },
        { path: 'language.current', message: '"english" is not a language code' },
        { path: 'templates.extension', message: 'must start with "."' }
      ]);
    });
  });

  describe('ConfigLoader', () => {
    let tempDir: string;
    let globalConfigPath: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'textblocks-config-'));
      globalConfigPath = path.join(tempDir, 'global', 'textblocks.json');
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    const writeJson = (filePath: string, value: unknown) => {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify(value));
    };

    it('returns the defaults when no file exists', () => {
      const loader = new ConfigLoader({ projectPath: tempDir, globalConfigPath });
      expect(loader.load()).toEqual(DEFAULT_CONFIG);
    });

    it('lets project settings override global ones', () => {
      writeJson(globalConfigPath, { language: { default: 'de' }, corpus: { fields: ['body', 'teaser'] } });
      writeJson(path.join(tempDir, PROJECT_CONFIG_FILE), { grammar: { splitChar: '-' }, corpus: { fields: ['text'] } });

      const config = new ConfigLoader({ projectPath: tempDir, globalConfigPath }).load();
      expect(config.grammar).toEqual({ ...DEFAULT_GRAMMAR, splitChar: '-' });
      expect(config.language).toEqual({ default: 'de', current: 'de' });
      expect(config.corpus).toEqual({ directory: 'content', fields: ['text'] });
    });

    it('caches the loaded configuration', () => {
      const loader = new ConfigLoader({ projectPath: tempDir, globalConfigPath });
      expect(loader.load()).toBe(loader.load());
    });

    it('rejects a file that is not JSON', () => {
      fs.writeFileSync(path.join(tempDir, PROJECT_CONFIG_FILE), '{ grammar: ');
      const loader = new ConfigLoader({ projectPath: tempDir, globalConfigPath });

      expect(() => loader.load()).toThrow(ConfigurationError);
    });

    it('rejects a section that is not an object', () => {
      writeJson(path.join(tempDir, PROJECT_CONFIG_FILE), { grammar: 'start' });
      const loader = new ConfigLoader({ projectPath: tempDir, globalConfigPath });

      expect(() => loader.load()).toThrow('must be a JSON object');
    });

    it('reports every invalid setting with the file path', () => {
      const projectFile = path.join(tempDir, PROJECT_CONFIG_FILE);
      writeJson(projectFile, { grammar: { splitChar: 'x' } });

      let caught: unknown;
      try {
        new ConfigLoader({ projectPath: tempDir, globalConfigPath }).load();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({
        details: {
          filePath: projectFile,
          issues: [{ path: 'grammar.splitChar', message: '"x" may not be a letter, digit, whitespace, "<" or ">"' }]
        }
      });
    });

    it('refuses to save an invalid grammar', () => {
      const loader = new ConfigLoader({ projectPath: tempDir, globalConfigPath });

      expect(() => loader.save({ grammar: { startWord: 'show' } })).toThrow(ConfigurationError);
      expect(fs.existsSync(loader.getProjectConfigPath())).toBe(false);
    });

    it('saves valid settings for the next load', () => {
      const loader = new ConfigLoader({ projectPath: tempDir, globalConfigPath });
      loader.load();

      loader.save({ grammar: { startWord: 'begin', stopWord: 'end' } });
      expect(loader.load().grammar).toEqual({ startWord: 'begin', stopWord: 'end', showWord: 'show', splitChar: '_' });
    });
  });
});

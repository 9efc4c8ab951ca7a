/**
 * Command Context Utilities
 *
 * Builds the engine, corpus and template renderer every command works with,
 * all resolved against the project directory the command runs in.
 */

import * as path from 'path';
import { BlockEngine } from '@api/index';
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig } from '@core/config/types';
import { cliLogger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { StaticLanguageContext } from '@services/language/StaticLanguageContext';
import { FileDocumentStore } from '@services/store/FileDocumentStore';
import { LiquidTemplateRenderer } from '@services/templates/LiquidTemplateRenderer';
import { CollectingWarningReporter } from '@services/ValidationService/CollectingWarningReporter';

export interface CommandOutput {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CommandOutput = {
  log: line => console.log(line),
  error: line => console.error(line)
};

export interface CommandContext {
  projectRoot: string;
  config: ResolvedConfig;
  store: FileDocumentStore;
  engine: BlockEngine;
  reporter: CollectingWarningReporter;
  output: CommandOutput;
}

export interface CommandContextOptions {
  startPath?: string;
  // Active language for this command; defaults to the configured one
  language?: string;
  fileSystem?: IFileSystemService;
  // Skips ~/.config/textblocks.json when set, mostly for tests
  globalConfigPath?: string;
  output?: CommandOutput;
}

/**
 * Load configuration from the project root and wire a file-backed corpus.
 * @throws {ConfigurationError} when the configuration is invalid
 */
export function getCommandContext(options: CommandContextOptions = {}): CommandContext {
  const projectRoot = path.resolve(options.startPath ?? process.cwd());
  const fileSystem = options.fileSystem ?? new NodeFileSystem();
  const config = new ConfigLoader({ projectPath: projectRoot, globalConfigPath: options.globalConfigPath }).load();

  const store = new FileDocumentStore({
    directory: path.resolve(projectRoot, config.corpus.directory),
    fileSystem,
    fields: config.corpus.fields
  });
  const reporter = new CollectingWarningReporter();
  const engine = new BlockEngine({
    store,
    config,
    language: new StaticLanguageContext(options.language ?? config.language.current, config.language.default),
    templates: new LiquidTemplateRenderer({
      directory: path.resolve(projectRoot, config.templates.directory),
      extension: config.templates.extension,
      fileSystem
    }),
    reporter
  });

  cliLogger.debug('Created command context', {
    projectRoot,
    corpus: config.corpus.directory,
    language: options.language ?? config.language.current
  });

  return { projectRoot, config, store, engine, reporter, output: options.output ?? consoleOutput };
}

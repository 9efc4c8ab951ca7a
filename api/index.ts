/**
 * textblocks API entry point
 *
 * Wires the block services around a document store and exposes the render,
 * save and lookup operations.
 */
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedConfig, TextblocksConfig } from '@core/config/types';
import { applyDefaults, assertValidConfig } from '@core/config/utils';
import type { RenderScope, ResolutionOptions, ResolvedBlock } from '@core/types/block';
import type {
  IDocumentStore,
  ILanguageContext,
  ITemplateRenderer,
  IWarningReporter
} from '@core/types/document';
import { CommentService } from '@services/CommentService/CommentService';
import { ExtractionService } from '@services/ExtractionService/ExtractionService';
import { FormatService } from '@services/FormatService/FormatService';
import { GrammarService } from '@services/GrammarService/GrammarService';
import { StaticLanguageContext } from '@services/language/StaticLanguageContext';
import { LifecycleService } from '@services/LifecycleService/LifecycleService';
import { ResolutionService } from '@services/ResolutionService/ResolutionService';
import { SubstitutionService } from '@services/SubstitutionService/SubstitutionService';
import type { ValidationResult } from '@services/ValidationService/IValidationService';
import { ValidationService } from '@services/ValidationService/ValidationService';

export * from '@core/errors/index';
export type * from '@core/types/index';
export { BLOCK_CAPABILITY } from '@core/types/document';
export type { ResolvedConfig, TextblocksConfig, GrammarConfig } from '@core/config/types';
export type { ValidationResult };
export { ConfigLoader };
export { MemoryDocumentStore, MemoryDocument } from '@services/store/MemoryDocumentStore';
export type { MemoryDocumentInit } from '@services/store/MemoryDocumentStore';
export { FileDocumentStore } from '@services/store/FileDocumentStore';
export { NodeFileSystem } from '@services/fs/NodeFileSystem';
export type { IFileSystemService } from '@services/fs/IFileSystemService';
export { LiquidTemplateRenderer } from '@services/templates/LiquidTemplateRenderer';
export { StaticLanguageContext };
export { CollectingWarningReporter } from '@services/ValidationService/CollectingWarningReporter';
export { BlockMap } from '@services/ExtractionService/BlockMap';

export interface BlockEngineOptions {
  store: IDocumentStore;
  /** Partial settings are completed from the defaults */
  config?: TextblocksConfig;
  language?: ILanguageContext;
  templates?: ITemplateRenderer;
  reporter?: IWarningReporter;
}

export interface CreateBlockEngineOptions extends Omit<BlockEngineOptions, 'config'> {
  config?: TextblocksConfig;
  /** Where to look for textblocks.config.json when no config is given */
  projectPath?: string;
}

export class BlockEngine {
  readonly config: ResolvedConfig;
  readonly grammar: GrammarService;
  private readonly extraction: ExtractionService;
  private readonly comments: CommentService;
  private readonly resolution: ResolutionService;
  private readonly validation: ValidationService;
  private readonly format: FormatService;
  private readonly lifecycle: LifecycleService;

  /**
   * @throws {ConfigurationError} for an invalid grammar or language setting
   */
  constructor(options: BlockEngineOptions) {
    this.config = applyDefaults(options.config ?? {});
    assertValidConfig(this.config);

    const language = options.language
      ?? new StaticLanguageContext(this.config.language.current, this.config.language.default);

    this.grammar = new GrammarService(this.config.grammar);
    this.extraction = new ExtractionService(this.grammar);
    this.comments = new CommentService();
    this.resolution = new ResolutionService({
      grammar: this.grammar,
      extraction: this.extraction,
      store: options.store,
      language,
      templates: options.templates
    });
    this.validation = new ValidationService({
      grammar: this.grammar,
      extraction: this.extraction,
      store: options.store,
      reporter: options.reporter
    });
    this.format = new FormatService({
      grammar: this.grammar,
      extraction: this.extraction,
      substitution: new SubstitutionService(this.grammar),
      comments: this.comments,
      resolution: this.resolution
    });
    this.lifecycle = new LifecycleService(options.store);
  }

  /**
   * Render-time formatting of one field value. Pass the same scope to nested
   * calls made while this render is running.
   */
  formatDocumentText(text: string, scope?: RenderScope): Promise<string> {
    return this.format.formatDocumentText(text, scope);
  }

  createRenderScope(): RenderScope {
    return this.format.createRenderScope();
  }

  /**
   * Save-time uniqueness check of one field value. Validation only runs when
   * the value changed since it was loaded.
   */
  async beforeSave(
    documentId: string,
    fieldNames: string[],
    text: string,
    previousText?: string
  ): Promise<ValidationResult> {
    if (previousText !== undefined && previousText === text) {
      return { text, changed: false, renamed: [], warnings: [] };
    }
    return this.validation.validate(documentId, fieldNames, text);
  }

  getBlock(name: string, options: ResolutionOptions = {}): Promise<ResolvedBlock> {
    return this.resolution.resolve(name, options);
  }

  getMultiBlock(name: string, options: Omit<ResolutionOptions, 'multiplicity'> = {}): Promise<ResolvedBlock> {
    return this.resolution.resolve(name, { ...options, multiplicity: 'multi' });
  }

  /**
   * Block definitions of a single text, keyed by name (`name_` for
   * multi-value blocks).
   */
  extractBlocks(text: string): Record<string, string> {
    return this.extraction.extract(text, false).blocks.toRecord();
  }

  stripComments(text: string): string {
    return this.comments.stripComments(text);
  }

  /**
   * @throws {UninstallBlockedError} while any field still has block processing enabled
   */
  assertCanUninstall(): Promise<void> {
    return this.lifecycle.assertCanUninstall();
  }
}

/**
 * Build an engine, loading configuration from disk when none is passed.
 */
export function createBlockEngine(options: CreateBlockEngineOptions): BlockEngine {
  const { projectPath, config, ...rest } = options;
  return new BlockEngine({
    ...rest,
    config: config ?? new ConfigLoader({ projectPath }).load()
  });
}

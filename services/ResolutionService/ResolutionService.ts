import { BlockResolutionError } from '@core/errors/BlockResolutionError';
import type { ResolutionOptions, ResolvedBlock } from '@core/types/block';
import {
  BLOCK_CAPABILITY,
  type IDocumentStore,
  type ILanguageContext,
  type ITemplateRenderer,
  type TemplateRenderContext
} from '@core/types/document';
import { resolutionLogger as logger } from '@core/utils/logger';
import type { IExtractionService } from '@services/ExtractionService/IExtractionService';
import type { IGrammarService } from '@services/GrammarService/IGrammarService';
import type { IResolutionService } from './IResolutionService';

export interface ResolutionServiceDependencies {
  grammar: IGrammarService;
  extraction: IExtractionService;
  store: IDocumentStore;
  language: ILanguageContext;
  templates?: ITemplateRenderer;
}

interface Lookup {
  name: string;
  multi: boolean;
  fields: string[];
}

export class ResolutionService implements IResolutionService {
  private readonly grammar: IGrammarService;
  private readonly extraction: IExtractionService;
  private readonly store: IDocumentStore;
  private readonly language: ILanguageContext;
  private readonly templates?: ITemplateRenderer;

  constructor(dependencies: ResolutionServiceDependencies) {
    this.grammar = dependencies.grammar;
    this.extraction = dependencies.extraction;
    this.store = dependencies.store;
    this.language = dependencies.language;
    this.templates = dependencies.templates;
  }

  async resolve(name: string, options: ResolutionOptions = {}): Promise<ResolvedBlock> {
    const itemized = options.resultShape === 'itemized';
    const empty: ResolvedBlock = itemized ? [] : '';

    const safeName = this.grammar.sanitizeName(name);
    if (!safeName) {
      return empty;
    }

    const fields = await this.resolveFieldScope(safeName, options.fieldScope);
    if (fields.length === 0) {
      logger.debug('No block-enabled fields; nothing to resolve', { name: safeName });
      return empty;
    }

    const lookup: Lookup = { name: safeName, multi: options.multiplicity === 'multi', fields };
    let language = options.language ?? this.language.getCurrentLanguage();
    let matches = await this.collect(lookup, language);

    const defaultLanguage = this.language.getDefaultLanguage();
    if (matches.length === 0 && language !== defaultLanguage) {
      logger.debug('Falling back to default language', { name: safeName, language, defaultLanguage });
      language = defaultLanguage;
      matches = await this.collect(lookup, language);
    }

    if (matches.length === 0) {
      return empty;
    }

    const context: TemplateRenderContext = { language, scope: options.scope };
    if (itemized) {
      const items: string[] = [];
      for (const match of matches) {
        items.push(await this.applyOverride(safeName, match, context));
      }
      return items;
    }
    return this.applyOverride(safeName, matches.join('\n'), context);
  }

  private async resolveFieldScope(name: string, fieldScope?: string | string[]): Promise<string[]> {
    const requested = typeof fieldScope === 'string' ? [fieldScope] : fieldScope ?? [];
    const explicit = Array.from(new Set(requested.filter(field => field.length > 0)));
    if (explicit.length > 0) {
      return explicit;
    }

    try {
      return await this.store.findFieldsByCapability(BLOCK_CAPABILITY);
    } catch (error) {
      throw new BlockResolutionError(
        `Could not list block-enabled fields while resolving "${name}"`,
        { blockName: name, stage: 'store' },
        error
      );
    }
  }

  /**
   * Read every viewable candidate in store order. Single lookups stop at the
   * first document that defines the block.
   */
  private async collect(lookup: Lookup, language: string): Promise<string[]> {
    const { name, multi, fields } = lookup;
    const matches: string[] = [];

    try {
      const candidates = await this.store.findDocuments({
        fieldScope: fields,
        containsSubstring: this.grammar.startTag(name, multi),
        includeHidden: true
      });

      for (const document of candidates) {
        if (!(await document.isViewable())) {
          logger.debug('Skipping document that is not viewable', { documentId: document.id, name });
          continue;
        }

        for (const field of fields) {
          const value = document.getFieldValue(field, language);
          if (!value) continue;

          const content = this.extraction.extract(value, false).blocks.get(name, multi);
          if (content === undefined) continue;

          matches.push(content);
          if (!multi) {
            return matches;
          }
        }
      }
    } catch (error) {
      throw new BlockResolutionError(
        `Document lookup failed while resolving "${name}"`,
        { blockName: name, stage: 'store' },
        error
      );
    }

    return matches;
  }

  private async applyOverride(name: string, value: string, context: TemplateRenderContext): Promise<string> {
    if (!this.templates) {
      return value;
    }

    try {
      const rendered = await this.templates.render(name, value, context);
      return rendered ?? value;
    } catch (error) {
      throw new BlockResolutionError(
        `Template override failed for block "${name}"`,
        { blockName: name, stage: 'template' },
        error
      );
    }
  }
}

import {
  BLOCK_CAPABILITY,
  type IDocumentStore,
  type IWarningReporter
} from '@core/types/document';
import { validationLogger as logger } from '@core/utils/logger';
import type { IExtractionService } from '@services/ExtractionService/IExtractionService';
import type { IGrammarService } from '@services/GrammarService/IGrammarService';
import type { IValidationService, ValidationResult } from './IValidationService';

export interface ValidationServiceDependencies {
  grammar: IGrammarService;
  extraction: IExtractionService;
  store: IDocumentStore;
  reporter?: IWarningReporter;
}

export class ValidationService implements IValidationService {
  private readonly grammar: IGrammarService;
  private readonly extraction: IExtractionService;
  private readonly store: IDocumentStore;
  private readonly reporter?: IWarningReporter;

  constructor(dependencies: ValidationServiceDependencies) {
    this.grammar = dependencies.grammar;
    this.extraction = dependencies.extraction;
    this.store = dependencies.store;
    this.reporter = dependencies.reporter;
  }

  async validate(documentId: string, fieldScope: string[], text: string): Promise<ValidationResult> {
    const unchanged: ValidationResult = { text, changed: false, renamed: [], warnings: [] };

    const singleNames = this.extraction.extract(text, false).blocks.singleNames();
    if (singleNames.length === 0) {
      return unchanged;
    }

    const fields = fieldScope.length > 0
      ? fieldScope
      : await this.store.findFieldsByCapability(BLOCK_CAPABILITY);
    if (fields.length === 0) {
      return unchanged;
    }

    let result = text;
    const renamed: string[] = [];
    const warnings: string[] = [];

    for (const name of singleNames) {
      if (!(await this.isDefinedElsewhere(documentId, name, fields))) continue;

      result = this.convertToMulti(result, name);
      renamed.push(name);

      const before = this.grammar.startTag(name, false);
      const after = this.grammar.startTag(name, true);
      const warning = `The block name "${name}" is already used in another document, so "${before}" was changed to "${after}".`;
      warnings.push(warning);

      logger.warn('Converted colliding block to multi-value form', { documentId, name, before, after });
      this.reporter?.warn(warning, { documentId, name });
    }

    if (renamed.length === 0) {
      return unchanged;
    }
    return { text: result, changed: result !== text, renamed, warnings };
  }

  /**
   * Whether a document other than `documentId` defines `name` as a
   * single-value block in any stored language.
   */
  private async isDefinedElsewhere(documentId: string, name: string, fields: string[]): Promise<boolean> {
    const candidates = await this.store.findDocuments({
      fieldScope: fields,
      containsSubstring: this.grammar.startTag(name, false),
      includeHidden: true,
      excludeIds: [documentId]
    });

    for (const document of candidates) {
      if (document.id === documentId) continue;
      for (const field of fields) {
        for (const value of document.getFieldValues(field)) {
          if (this.extraction.extract(value, false).blocks.has(name, false)) {
            return true;
          }
        }
      }
    }
    return false;
  }

  private convertToMulti(text: string, name: string): string {
    const doubled = this.grammar.separator(true);
    return text.replace(
      this.grammar.getSingleMarkerPattern(name),
      (_marker: string, word: string, matchedName: string) => `${word}${doubled}${matchedName}`
    );
  }
}

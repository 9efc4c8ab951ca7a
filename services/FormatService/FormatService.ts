import type { RenderScope } from '@core/types/block';
import { formatLogger as logger } from '@core/utils/logger';
import type { ICommentService } from '@services/CommentService/ICommentService';
import type { IExtractionService } from '@services/ExtractionService/IExtractionService';
import type { IGrammarService } from '@services/GrammarService/IGrammarService';
import type { IResolutionService } from '@services/ResolutionService/IResolutionService';
import type { ISubstitutionService } from '@services/SubstitutionService/ISubstitutionService';
import type { IFormatService } from './IFormatService';
import { RenderGuard } from './RenderGuard';

export interface FormatServiceDependencies {
  grammar: IGrammarService;
  extraction: IExtractionService;
  substitution: ISubstitutionService;
  comments: ICommentService;
  resolution: IResolutionService;
}

export class FormatService implements IFormatService {
  constructor(private readonly services: FormatServiceDependencies) {}

  createRenderScope(): RenderScope {
    return new RenderGuard();
  }

  async formatDocumentText(text: string, scope: RenderScope = new RenderGuard()): Promise<string> {
    if (!scope.enter()) {
      return text;
    }

    const { grammar, extraction, substitution, comments } = this.services;
    try {
      let result = text;

      // Definitions not yet stripped at save time lose their markers here
      if (grammar.hasStartMarker(result)) {
        result = extraction.extract(result, true).text;
      }

      if (grammar.hasShowMarker(result)) {
        result = await substitution.substitute(result, (name, multi) => this.lookup(name, multi, scope));
      }

      const formatted = comments.stripComments(result);
      logger.debug('Formatted document text', { inputLength: text.length, outputLength: formatted.length });
      return formatted;
    } finally {
      scope.exit();
    }
  }

  private async lookup(name: string, multi: boolean, scope: RenderScope): Promise<string> {
    const resolved = await this.services.resolution.resolve(name, {
      multiplicity: multi ? 'multi' : 'single',
      resultShape: 'concatenated',
      scope
    });
    return typeof resolved === 'string' ? resolved : resolved.join('\n');
  }
}

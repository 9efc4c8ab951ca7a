import { extractionLogger as logger } from '@core/utils/logger';
import type { IGrammarService, DefinitionGroups } from '@services/GrammarService/IGrammarService';
import { BlockMap } from './BlockMap';
import type { ExtractionResult, IExtractionService } from './IExtractionService';

export class ExtractionService implements IExtractionService {
  constructor(private readonly grammar: IGrammarService) {}

  extract(text: string, removeFromText: boolean): ExtractionResult {
    const blocks = new BlockMap(this.grammar.getConfig().splitChar);

    if (!this.grammar.hasStartMarker(text)) {
      return { blocks, text };
    }

    let result = '';
    let lastIndex = 0;
    let definitions = 0;

    for (const match of text.matchAll(this.grammar.getDefinitionPattern())) {
      const definition = this.grammar.readDefinition(match);
      if (!definition || match.index === undefined) continue;

      definitions++;
      blocks.define(definition.name, definition.content, this.grammar.isMultiSeparator(definition.sep));

      if (removeFromText) {
        result += text.slice(lastIndex, match.index) + ExtractionService.unwrap(definition);
        lastIndex = match.index + match[0].length;
      }
    }

    logger.debug('Extracted block definitions', {
      definitions,
      blocks: blocks.size,
      stripped: removeFromText
    });

    if (!removeFromText || definitions === 0) {
      return { blocks, text };
    }
    return { blocks, text: result + text.slice(lastIndex) };
  }

  /**
   * The definition's content, keeping any markup tag that only sat on one
   * side of a marker so the surrounding HTML stays balanced.
   */
  private static unwrap(definition: DefinitionGroups): string {
    return (
      ExtractionService.unpaired(definition.startOpen, definition.startClose) +
      definition.content +
      ExtractionService.unpaired(definition.stopOpen, definition.stopClose)
    );
  }

  private static unpaired(open?: string, close?: string): string {
    if (open && close) return '';
    return open ?? close ?? '';
  }
}

import type { BlockLookup } from '@core/types/block';
import { substitutionLogger as logger } from '@core/utils/logger';
import type { IGrammarService } from '@services/GrammarService/IGrammarService';
import type { ISubstitutionService } from './ISubstitutionService';

export class SubstitutionService implements ISubstitutionService {
  constructor(private readonly grammar: IGrammarService) {}

  async substitute(text: string, lookup: BlockLookup): Promise<string> {
    if (!this.grammar.hasShowMarker(text)) {
      return text;
    }

    const matches = Array.from(text.matchAll(this.grammar.getShowPattern()));
    if (matches.length === 0) {
      return text;
    }

    // Resolve each distinct span once, in order of first appearance
    const replacements = new Map<string, string>();
    for (const match of matches) {
      const span = match[0];
      const show = this.grammar.readShow(match);
      if (!show || replacements.has(span)) continue;

      const multi = this.grammar.isMultiSeparator(show.sep);
      let resolved = '';
      try {
        resolved = await lookup(show.name, multi);
      } catch (error) {
        logger.warn('Block reference could not be resolved', {
          name: show.name,
          multi,
          error: error instanceof Error ? error.message : String(error)
        });
      }

      // A tag that wraps only one side of the marker belongs to the surrounding text
      const open = show.open && !show.close ? show.open : '';
      const close = show.close && !show.open ? show.close : '';
      replacements.set(span, open + resolved + close);
    }

    let result = '';
    let lastIndex = 0;
    for (const match of matches) {
      const replacement = replacements.get(match[0]);
      if (replacement === undefined || match.index === undefined) continue;
      result += text.slice(lastIndex, match.index) + replacement;
      lastIndex = match.index + match[0].length;
    }

    logger.debug('Substituted block references', {
      references: matches.length,
      distinct: replacements.size
    });

    return result + text.slice(lastIndex);
  }
}

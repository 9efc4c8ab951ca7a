import type { ILanguageContext } from '@core/types/document';

/**
 * Fixed current and default language, e.g. from configuration or a request.
 */
export class StaticLanguageContext implements ILanguageContext {
  constructor(
    private readonly current: string,
    private readonly defaultLanguage: string = current
  ) {}

  getCurrentLanguage(): string {
    return this.current;
  }

  getDefaultLanguage(): string {
    return this.defaultLanguage;
  }
}

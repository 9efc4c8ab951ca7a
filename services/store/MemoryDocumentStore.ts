import {
  BLOCK_CAPABILITY,
  type CorpusDocument,
  type DocumentSelector,
  type FieldValue,
  type IDocumentStore
} from '@core/types/document';

export interface MemoryDocumentInit {
  id: string;
  fields: Record<string, FieldValue>;
  /** Listed by default searches; defaults to true */
  published?: boolean;
  /** Passes the per-document access check; defaults to true */
  viewable?: boolean;
}

export class MemoryDocument implements CorpusDocument {
  readonly id: string;
  published: boolean;
  viewable: boolean;
  private readonly fields: Map<string, FieldValue>;

  constructor(init: MemoryDocumentInit) {
    this.id = init.id;
    this.published = init.published ?? true;
    this.viewable = init.viewable ?? true;
    this.fields = new Map(
      Object.entries(init.fields).map(([name, value]): [string, FieldValue] =>
        [name, typeof value === 'string' ? value : { ...value }]
      )
    );
  }

  isViewable(): boolean {
    return this.viewable;
  }

  /**
   * Raw values apply to every language. A per-language value has no
   * fallback here; without a language the first stored translation is used.
   */
  getFieldValue(fieldName: string, language?: string): string | undefined {
    const value = this.fields.get(fieldName);
    if (value === undefined || typeof value === 'string') {
      return value;
    }
    if (language === undefined) {
      return Object.values(value)[0];
    }
    return value[language];
  }

  getFieldValues(fieldName: string): string[] {
    const value = this.fields.get(fieldName);
    if (value === undefined) return [];
    return typeof value === 'string' ? [value] : Object.values(value);
  }

  /** Each stored value with its language; raw values have none. */
  fieldEntries(fieldName: string): Array<{ language?: string; value: string }> {
    const value = this.fields.get(fieldName);
    if (value === undefined) return [];
    if (typeof value === 'string') return [{ value }];
    return Object.entries(value).map(([language, text]) => ({ language, value: text }));
  }

  setFieldValue(fieldName: string, value: string, language?: string): void {
    const existing = this.fields.get(fieldName);
    if (language === undefined) {
      this.fields.set(fieldName, value);
      return;
    }
    const translations: Record<string, string> = existing === undefined || typeof existing === 'string' ? {} : { ...existing };
    translations[language] = value;
    this.fields.set(fieldName, translations);
  }

  toJSON(): MemoryDocumentInit {
    return {
      id: this.id,
      published: this.published,
      viewable: this.viewable,
      fields: Object.fromEntries(this.fields)
    };
  }
}

export interface MemoryDocumentStoreOptions {
  /** Fields with block processing enabled */
  fields?: string[];
  documents?: MemoryDocumentInit[];
}

/**
 * Document store held in memory. Searches match substrings
 * case-insensitively across every language of a field.
 */
export class MemoryDocumentStore implements IDocumentStore {
  protected readonly documents = new Map<string, MemoryDocument>();
  private readonly enabledFields: Set<string>;

  constructor(options: MemoryDocumentStoreOptions = {}) {
    this.enabledFields = new Set(options.fields ?? []);
    for (const init of options.documents ?? []) {
      this.add(init);
    }
  }

  add(init: MemoryDocumentInit): MemoryDocument {
    const document = new MemoryDocument(init);
    this.documents.set(document.id, document);
    return document;
  }

  get(id: string): MemoryDocument | undefined {
    return this.documents.get(id);
  }

  all(): MemoryDocument[] {
    return Array.from(this.documents.values());
  }

  enableField(fieldName: string): void {
    this.enabledFields.add(fieldName);
  }

  disableField(fieldName: string): void {
    this.enabledFields.delete(fieldName);
  }

  async findFieldsByCapability(capability: string): Promise<string[]> {
    return capability === BLOCK_CAPABILITY ? Array.from(this.enabledFields) : [];
  }

  async findDocuments(selector: DocumentSelector): Promise<CorpusDocument[]> {
    const needle = selector.containsSubstring.toLowerCase();
    const excluded = new Set(selector.excludeIds ?? []);

    return this.all().filter(document => {
      if (excluded.has(document.id)) return false;
      if (!selector.includeHidden && !document.published) return false;
      return selector.fieldScope.some(field =>
        document.getFieldValues(field).some(value => value.toLowerCase().includes(needle))
      );
    });
  }
}

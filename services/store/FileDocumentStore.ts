import * as path from 'path';
import { DocumentStoreError } from '@core/errors/DocumentStoreError';
import type { CorpusDocument, DocumentSelector, FieldValue } from '@core/types/document';
import { storeLogger as logger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { MemoryDocumentStore, type MemoryDocument, type MemoryDocumentInit } from './MemoryDocumentStore';

export interface FileDocumentStoreOptions {
  directory: string;
  fileSystem: IFileSystemService;
  fields?: string[];
}

/**
 * Corpus backed by a directory of JSON documents:
 *
 *   { "id": "about", "published": true, "fields": { "body": "…" } }
 *
 * A missing `id` falls back to the file name without `.json`. Field values
 * are strings or objects keyed by language code.
 */
export class FileDocumentStore extends MemoryDocumentStore {
  private readonly directory: string;
  private readonly fileSystem: IFileSystemService;
  private readonly paths = new Map<string, string>();
  private loaded?: Promise<void>;

  constructor(options: FileDocumentStoreOptions) {
    super({ fields: options.fields });
    this.directory = options.directory;
    this.fileSystem = options.fileSystem;
  }

  /**
   * Read every document once; later calls reuse the first load.
   * @throws {DocumentStoreError}
   */
  load(): Promise<void> {
    if (!this.loaded) {
      this.loaded = this.readDirectory();
    }
    return this.loaded;
  }

  async findDocuments(selector: DocumentSelector): Promise<CorpusDocument[]> {
    await this.load();
    return super.findDocuments(selector);
  }

  async getDocument(id: string): Promise<MemoryDocument | undefined> {
    await this.load();
    return this.get(id);
  }

  async listDocuments(): Promise<MemoryDocument[]> {
    await this.load();
    return this.all();
  }

  async saveDocument(id: string): Promise<void> {
    await this.load();
    const document = this.get(id);
    if (!document) {
      throw new DocumentStoreError(`Unknown document "${id}"`, { documentId: id, operation: 'save' });
    }

    const filePath = this.paths.get(id) ?? path.join(this.directory, `${id}.json`);
    try {
      await this.fileSystem.writeFile(filePath, JSON.stringify(document.toJSON(), null, 2) + '\n');
    } catch (error) {
      throw new DocumentStoreError(`Failed to write document "${id}"`, { documentId: id, filePath, operation: 'save' }, error);
    }
    this.paths.set(id, filePath);
    logger.info('Saved document', { documentId: id, filePath });
  }

  private async readDirectory(): Promise<void> {
    if (!(await this.fileSystem.isDirectory(this.directory))) {
      logger.warn('Corpus directory does not exist', { directory: this.directory });
      return;
    }

    const entries = (await this.fileSystem.readdir(this.directory))
      .filter(entry => entry.endsWith('.json'))
      .sort();

    for (const entry of entries) {
      const filePath = path.join(this.directory, entry);
      const init = parseDocumentFile(await this.readJson(filePath), path.basename(entry, '.json'), filePath);
      this.add(init);
      this.paths.set(init.id, filePath);
    }

    logger.debug('Loaded corpus', { directory: this.directory, documents: entries.length });
  }

  private async readJson(filePath: string): Promise<unknown> {
    try {
      return JSON.parse(await this.fileSystem.readFile(filePath));
    } catch (error) {
      throw new DocumentStoreError(`Failed to read document file ${filePath}`, { filePath, operation: 'load' }, error);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFieldValue(value: unknown): FieldValue | undefined {
  if (typeof value === 'string') return value;
  if (!isRecord(value)) return undefined;

  const translations: Record<string, string> = {};
  for (const [language, text] of Object.entries(value)) {
    if (typeof text !== 'string') return undefined;
    translations[language] = text;
  }
  return translations;
}

export function parseDocumentFile(raw: unknown, fallbackId: string, filePath: string): MemoryDocumentInit {
  const invalid = (reason: string) =>
    new DocumentStoreError(`Invalid document file ${filePath}: ${reason}`, { filePath, operation: 'load' });

  if (!isRecord(raw)) throw invalid('expected a JSON object');

  const { id, published, viewable, fields: rawFields } = raw;
  if (id !== undefined && typeof id !== 'string') throw invalid('"id" must be a string');
  if (published !== undefined && typeof published !== 'boolean') throw invalid('"published" must be a boolean');
  if (viewable !== undefined && typeof viewable !== 'boolean') throw invalid('"viewable" must be a boolean');
  if (!isRecord(rawFields)) throw invalid('"fields" must be an object');

  const fields: Record<string, FieldValue> = {};
  for (const [name, value] of Object.entries(rawFields)) {
    const parsed = parseFieldValue(value);
    if (parsed === undefined) throw invalid(`field "${name}" must be a string or a map of language to string`);
    fields[name] = parsed;
  }

  return {
    id: typeof id === 'string' ? id : fallbackId,
    published: typeof published === 'boolean' ? published : undefined,
    viewable: typeof viewable === 'boolean' ? viewable : undefined,
    fields
  };
}

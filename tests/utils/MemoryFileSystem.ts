import * as path from 'path';
import type { IFileSystemService } from '@services/fs/IFileSystemService';

/**
 * In-memory file system for testing. Directories exist implicitly whenever
 * a file lives below them.
 */
export class MemoryFileSystem implements IFileSystemService {
  private files = new Map<string, string>();
  readonly writes: string[] = [];

  constructor(initial: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(initial)) {
      this.files.set(this.normalizePath(filePath), content);
    }
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(this.normalizePath(filePath));
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), {
        code: 'ENOENT',
        path: filePath
      });
    }
    return content;
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    const normalizedPath = this.normalizePath(filePath);
    this.files.set(normalizedPath, content);
    this.writes.push(normalizedPath);
  }

  async exists(filePath: string): Promise<boolean> {
    const normalizedPath = this.normalizePath(filePath);
    return this.files.has(normalizedPath) || (await this.isDirectory(normalizedPath));
  }

  async readdir(dirPath: string): Promise<string[]> {
    const prefix = this.directoryPrefix(dirPath);
    const entries = new Set<string>();

    for (const filePath of this.files.keys()) {
      if (!filePath.startsWith(prefix)) continue;
      const [first] = filePath.slice(prefix.length).split('/');
      if (first) {
        entries.add(first);
      }
    }

    if (entries.size === 0) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, scandir '${dirPath}'`), {
        code: 'ENOENT',
        path: dirPath
      });
    }
    return Array.from(entries).sort();
  }

  async isDirectory(filePath: string): Promise<boolean> {
    const prefix = this.directoryPrefix(filePath);
    return Array.from(this.files.keys()).some(key => key.startsWith(prefix));
  }

  /** Current content of a file, for assertions. */
  get(filePath: string): string | undefined {
    return this.files.get(this.normalizePath(filePath));
  }

  private directoryPrefix(dirPath: string): string {
    const normalizedPath = this.normalizePath(dirPath);
    return normalizedPath === '/' ? '/' : normalizedPath + '/';
  }

  private normalizePath(filePath: string): string {
    return path.posix.resolve('/', filePath.split(path.sep).join('/'));
  }
}

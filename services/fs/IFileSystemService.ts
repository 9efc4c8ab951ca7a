/**
 * File access used by the file-backed document store and template overrides
 */
export interface IFileSystemService {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  exists(filePath: string): Promise<boolean>;
  readdir(dirPath: string): Promise<string[]>;
  isDirectory(filePath: string): Promise<boolean>;
}

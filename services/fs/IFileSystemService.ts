/**
 * File system access used by document discovery and the CLI
 */
export interface IFileSystemService {
  readFile(filePath: string): Promise<string>;
  readdir(dirPath: string): Promise<string[]>;
  isFile(filePath: string): Promise<boolean>;
}

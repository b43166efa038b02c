import * as fs from 'fs/promises';
import type { IFileSystemService } from './IFileSystemService';

/**
 * Node.js file system implementation
 */
export class NodeFileSystem implements IFileSystemService {
  async readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
  }

  async readdir(dirPath: string): Promise<string[]> {
    return await fs.readdir(dirPath);
  }

  async isFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }
}

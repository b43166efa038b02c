import * as path from 'path';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { DocumentNotFoundError } from '@core/errors';
import { locatorLogger as logger } from '@core/utils/logger';

export const DEFAULT_PROGRAM_NAME = 'mdtask';

/**
 * Names searched in each directory, most preferred first
 */
export function defaultDocumentNames(programName: string = DEFAULT_PROGRAM_NAME): string[] {
  return [`${programName}.md`, `.${programName}.md`, 'README.md'];
}

/**
 * Program name as invoked: the executable's basename without extension
 */
export function programNameOf(executablePath: string | undefined): string {
  if (!executablePath) {
    return DEFAULT_PROGRAM_NAME;
  }
  const base = path.basename(executablePath, path.extname(executablePath));
  return base || DEFAULT_PROGRAM_NAME;
}

/**
 * Walk from `startDir` up to the filesystem root looking for a document.
 * Within a directory names are tried in priority order and matched case-insensitively.
 *
 * @returns Absolute path of the first match
 */
export async function locateDocument(
  startDir: string,
  names: readonly string[],
  fileSystem: IFileSystemService
): Promise<string> {
  const start = path.resolve(startDir);
  const wanted = names.map(name => name.toLowerCase());
  let currentDir = start;

  logger.debug(`Searching for ${names.join(', ')} from: ${start}`);

  for (;;) {
    const entries = await readEntries(currentDir, fileSystem);

    for (const name of wanted) {
      for (const entry of entries) {
        if (entry.toLowerCase() !== name) continue;
        const candidate = path.join(currentDir, entry);
        if (await fileSystem.isFile(candidate)) {
          logger.debug(`Found document: ${candidate}`);
          return candidate;
        }
      }
    }

    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      throw new DocumentNotFoundError(names, start);
    }
    currentDir = parent;
  }
}

async function readEntries(dir: string, fileSystem: IFileSystemService): Promise<string[]> {
  try {
    return await fileSystem.readdir(dir);
  } catch (error) {
    // An unreadable directory is skipped; the walk goes on with its parent
    logger.debug(`Cannot list ${dir}`, { error: error instanceof Error ? error.message : String(error) });
    return [];
  }
}

/**
 * File Walker Utility
 *
 * Directory tree traversal used by workspace discovery.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { isJunk } from 'junk';
import { hasErrorCode } from './fs.js';

/**
 * Filter predicate for file walking
 */
export type FileFilter = (path: string, isDirectory: boolean) => boolean | Promise<boolean>;

/**
 * Async generator that walks a directory tree and yields file paths.
 * Symbolic links are not followed. A directory rejected by the filter is
 * not descended into.
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/dir')) {
 *   console.log(filePath);
 * }
 */
export async function* walkFiles(dir: string, filter?: FileFilter): AsyncGenerator<string> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    // Unreadable directories are skipped
    if (hasErrorCode(error, 'EACCES') || hasErrorCode(error, 'EPERM')) {
      return;
    }
    throw error;
  }

  // Stable traversal order across platforms
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (isJunk(entry.name) || entry.isSymbolicLink()) {
      continue;
    }

    const fullPath = join(dir, entry.name);
    const isDirectory = entry.isDirectory();

    if (filter && !(await filter(fullPath, isDirectory))) {
      continue;
    }

    if (isDirectory) {
      yield* walkFiles(fullPath, filter);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }
}

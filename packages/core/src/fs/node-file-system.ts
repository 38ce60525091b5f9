/**
 * @module fs/node-file-system
 * {@link FileSystemProvider} backed by the local disk.
 */

import * as fs from 'fs';
import fg from 'fast-glob';
import type { FileSystemProvider } from './types';

/**
 * Whether glob matching should be case-sensitive on this host. Windows and
 * macOS volumes are case-insensitive by default, Linux ones are not.
 */
const CASE_SENSITIVE_HOST = process.platform !== 'win32' && process.platform !== 'darwin';

export class NodeFileSystem implements FileSystemProvider {
  async ListSubdirectories(path: string): Promise<string[]> {
    await assertDirectory(path);
    // Symbolic links to folders are followed, the same as for script files
    return fg('*', {
      cwd: path,
      deep: 1,
      onlyDirectories: true,
      dot: true,
      followSymbolicLinks: true,
      throwErrorOnBrokenSymbolicLink: true,
      suppressErrors: false,
    });
  }

  async ListFiles(path: string, pattern: string): Promise<string[]> {
    await assertDirectory(path);
    // The folder is passed as cwd, so names with glob metacharacters need no escaping
    return fg(pattern, {
      cwd: path,
      deep: 1,
      onlyFiles: true,
      dot: true,
      caseSensitiveMatch: CASE_SENSITIVE_HOST,
      throwErrorOnBrokenSymbolicLink: true,
      suppressErrors: false,
    });
  }

  async ReadFile(path: string): Promise<Buffer> {
    // readFile opens, reads and closes the handle, including on error paths
    return fs.promises.readFile(path);
  }
}

/**
 * fast-glob treats a missing cwd as an empty match, so the folder is checked first.
 */
async function assertDirectory(path: string): Promise<void> {
  const stats = await fs.promises.stat(path);
  if (!stats.isDirectory()) {
    throw new Error(`ENOTDIR: not a directory, scandir '${path}'`);
  }
}

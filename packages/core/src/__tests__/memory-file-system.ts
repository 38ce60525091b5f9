import * as path from 'path';
import type { FileSystemProvider } from '../fs/types';

/**
 * File contents for the in-memory tree. An `Error` makes reads of that file fail.
 */
export type MemoryFile = string | Buffer | Error;

/** folder name → file name → contents, in enumeration order */
export type MemoryTree = Record<string, Record<string, MemoryFile>>;

/**
 * In-memory {@link FileSystemProvider} holding one level of folders under a
 * single root. Enumeration order is object insertion order.
 */
export class MemoryFileSystem implements FileSystemProvider {
  /** Paths passed to ReadFile, in call order */
  readonly Reads: string[] = [];

  constructor(
    private readonly root: string,
    private readonly tree: MemoryTree
  ) {}

  async ListSubdirectories(dirPath: string): Promise<string[]> {
    if (dirPath !== this.root) {
      throw new Error(`ENOENT: no such file or directory, scandir '${dirPath}'`);
    }
    return Object.keys(this.tree);
  }

  async ListFiles(dirPath: string, pattern: string): Promise<string[]> {
    const files = this.folderAt(dirPath);
    const matcher = globToRegExp(pattern);
    return Object.keys(files).filter((name) => matcher.test(name));
  }

  async ReadFile(filePath: string): Promise<Buffer> {
    this.Reads.push(filePath);
    const files = this.folderAt(path.dirname(filePath));
    const contents = files[path.basename(filePath)];
    if (contents === undefined) {
      throw new Error(`ENOENT: no such file or directory, open '${filePath}'`);
    }
    if (contents instanceof Error) {
      throw contents;
    }
    return typeof contents === 'string' ? Buffer.from(contents, 'utf-8') : contents;
  }

  private folderAt(dirPath: string): Record<string, MemoryFile> {
    const relative = path.relative(this.root, dirPath);
    const files = this.tree[relative];
    if (files === undefined || relative === '') {
      throw new Error(`ENOENT: no such file or directory, scandir '${dirPath}'`);
    }
    return files;
  }
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}$`);
}

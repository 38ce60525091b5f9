/**
 * @module fs/types
 * The filesystem operations the resolver depends on.
 *
 * The resolver never touches `fs` directly, so hosts can supply their own
 * implementation (an in-memory tree in tests, a virtual filesystem, etc.).
 */

export interface FileSystemProvider {
  /**
   * Lists the names (not paths) of the immediate subdirectories of `path`,
   * in the order the filesystem enumerates them.
   */
  ListSubdirectories(path: string): Promise<string[]>;

  /**
   * Lists the names of files directly under `path` whose name matches the
   * glob `pattern` (e.g. `*.sql`), in enumeration order.
   */
  ListFiles(path: string, pattern: string): Promise<string[]>;

  /**
   * Reads the entire file at `path`. Implementations must not leave the
   * file handle open, whether the read succeeds or fails.
   */
  ReadFile(path: string): Promise<Buffer>;
}

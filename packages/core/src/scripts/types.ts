/**
 * @module scripts/types
 * Type definitions for resolved migration scripts.
 */

/**
 * A migration script loaded from a version folder.
 */
export interface SqlScript {
  /**
   * Identity of the script: `<folderName>/<fileName>`, always with a forward
   * slash (e.g. `"1.0/001_create_users.sql"`). Prefixing the folder keeps
   * same-named files in different folders distinct.
   */
  Name: string;

  /** Decoded file contents */
  Contents: string;
}

/**
 * Predicate over folder names and composite `folder/file` names.
 * Return `true` to keep the entry.
 */
export type NameFilter = (name: string) => boolean;

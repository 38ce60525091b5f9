/**
 * @module @verfold/core
 *
 * Verfold — resolves database migration scripts stored in version-numbered
 * folders.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { VersionFolderResolver } from '@verfold/core';
 *
 * const scripts = await new VersionFolderResolver().Resolve({
 *   RootPath: './migrations',
 *   TargetVersion: '2.1',
 * });
 *
 * for (const script of scripts) {
 *   console.log(script.Name); // e.g. "2.0/001_add_audit.sql"
 * }
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { VersionFolderResolver, ResolveVersionFolders } from './scripts/resolver';
export type { ResolverCallbacks } from './scripts/resolver';
export { LoadFolderScripts, SCRIPT_FILE_PATTERN } from './scripts/folder-loader';
export type { FolderLoadContext } from './scripts/folder-loader';

// ─── Configuration ───────────────────────────────────────────────────
export { resolveRequest } from './core/config';
export type { ResolutionRequest, ResolvedRequest } from './core/config';

// ─── Scripts ─────────────────────────────────────────────────────────
export type { SqlScript, NameFilter } from './scripts/types';
export { DecodeScriptContent, IsScriptEncoding } from './scripts/decode';
export type { ScriptEncoding } from './scripts/decode';

// ─── Versions ────────────────────────────────────────────────────────
export { Version } from './version/version';
export { ParseVersion, TryParseVersion } from './version/parser';

// ─── Filesystem ──────────────────────────────────────────────────────
export type { FileSystemProvider } from './fs/types';
export { NodeFileSystem } from './fs/node-file-system';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  VerfoldError,
  MalformedVersionError,
  AmbiguousVersionError,
  ScriptReadError,
} from './core/errors';

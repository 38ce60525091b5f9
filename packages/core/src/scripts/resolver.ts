/**
 * @module scripts/resolver
 * Resolves the scripts of a directory of version folders.
 *
 * ```
 * migrations/
 *   1.0/            001_users.sql, 002_roles.sql
 *   1.1 hotfix/     001_fix_roles.sql
 *   2.0/            001_audit.sql
 * ```
 *
 * Without a target version every folder is read. With one, folder names are
 * parsed as versions, folders above the target are excluded and two folders
 * naming the same version (`1.1` and `01.01`) abort the resolution.
 *
 * The returned list follows filesystem enumeration order; sorting is left to
 * the caller.
 */

import type { FileSystemProvider } from '../fs/types';
import { NodeFileSystem } from '../fs/node-file-system';
import { resolveRequest } from '../core/config';
import type { ResolutionRequest, ResolvedRequest } from '../core/config';
import { AmbiguousVersionError } from '../core/errors';
import type { Version } from '../version/version';
import { ParseVersion } from '../version/parser';
import { LoadFolderScripts, withReadError } from './folder-loader';
import type { FolderLoadContext } from './folder-loader';
import type { SqlScript } from './types';

/**
 * Callback interface for observing a resolution pass.
 */
export interface ResolverCallbacks {
  /** Called for informational log messages */
  OnLog?: (message: string) => void;

  /** Called when a folder's scripts are about to be loaded. `version` is null without a target version. */
  OnFolderAccepted?: (folderName: string, version: Version | null) => void;

  /** Called when a folder is excluded for being above the target version */
  OnFolderSkipped?: (folderName: string, version: Version) => void;

  /** Called after each script is read */
  OnScriptLoaded?: (script: SqlScript) => void;
}

/**
 * Lists and loads scripts from version folders.
 *
 * Each call to {@link VersionFolderResolver.Resolve} is independent; the
 * resolver holds no state between calls other than its callbacks.
 *
 * @example
 * ```typescript
 * const resolver = new VersionFolderResolver().OnProgress({ OnLog: console.log });
 * const scripts = await resolver.Resolve({
 *   RootPath: './migrations',
 *   TargetVersion: '2.0',
 *   Filter: (name) => !name.startsWith('drafts'),
 * });
 * ```
 */
export class VersionFolderResolver {
  private readonly fileSystem: FileSystemProvider;
  private callbacks: ResolverCallbacks = {};

  constructor(fileSystem: FileSystemProvider = new NodeFileSystem()) {
    this.fileSystem = fileSystem;
  }

  /**
   * Registers callbacks for observing resolution progress.
   * Returns `this` for chaining.
   */
  OnProgress(callbacks: ResolverCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Resolves every script under the request's root directory.
   *
   * @returns Scripts in folder processing order, then file enumeration order
   * @throws MalformedVersionError if the target version, or a folder name considered in a bounded resolution, is not a version
   * @throws AmbiguousVersionError if two accepted folders parse to the same version
   * @throws ScriptReadError if a directory cannot be listed or a script cannot be read
   */
  async Resolve(request: ResolutionRequest): Promise<SqlScript[]> {
    const resolved = resolveRequest(request);

    return resolved.TargetVersion === null
      ? this.resolveWithoutTargetVersion(resolved)
      : this.resolveWithTargetVersion(resolved, resolved.TargetVersion);
  }

  private async resolveWithoutTargetVersion(request: ResolvedRequest): Promise<SqlScript[]> {
    const folderNames = await this.listFolders(request.RootPath);
    this.log(`Resolving ${folderNames.length} folder(s) in ${request.RootPath} (no target version)`);

    const context = this.createLoadContext(request);
    const scripts: SqlScript[] = [];

    for (const folderName of folderNames) {
      this.callbacks.OnFolderAccepted?.(folderName, null);
      scripts.push(...(await LoadFolderScripts(folderName, context)));
    }

    return scripts;
  }

  /**
   * Excludes folders with a version higher than the target version.
   * A filter must be supplied to keep folders without a version number out.
   */
  private async resolveWithTargetVersion(
    request: ResolvedRequest,
    targetVersion: string
  ): Promise<SqlScript[]> {
    let folderNames = await this.listFolders(request.RootPath);

    // filter on folder names
    const filter = request.Filter;
    if (filter) {
      folderNames = folderNames.filter((name) => filter(name));
    }

    if (folderNames.length === 0) {
      this.log(`No version folders found in ${request.RootPath}`);
      return [];
    }

    const target = ParseVersion(targetVersion);
    this.log(`Resolving ${folderNames.length} folder(s) in ${request.RootPath} up to version ${target}`);

    const context = this.createLoadContext(request);
    const scripts: SqlScript[] = [];
    const acceptedVersions = new Map<string, string>();

    for (const folderName of folderNames) {
      // Every folder reaching this point is expected to be parseable
      const folderVersion = ParseVersion(folderName);

      if (folderVersion.CompareTo(target) > 0) {
        this.callbacks.OnFolderSkipped?.(folderName, folderVersion);
        continue;
      }

      const key = folderVersion.toString();
      const claimedBy = acceptedVersions.get(key);
      if (claimedBy !== undefined) {
        throw new AmbiguousVersionError(key, folderName, claimedBy);
      }

      this.callbacks.OnFolderAccepted?.(folderName, folderVersion);
      scripts.push(...(await LoadFolderScripts(folderName, context)));
      acceptedVersions.set(key, folderName);
    }

    return scripts;
  }

  private listFolders(rootPath: string): Promise<string[]> {
    return withReadError(rootPath, `Cannot list version folders in "${rootPath}"`, () =>
      this.fileSystem.ListSubdirectories(rootPath)
    );
  }

  private createLoadContext(request: ResolvedRequest): FolderLoadContext {
    return {
      FileSystem: this.fileSystem,
      RootPath: request.RootPath,
      Filter: request.Filter,
      Encoding: request.Encoding,
      OnScriptLoaded: this.callbacks.OnScriptLoaded,
    };
  }

  private log(message: string): void {
    this.callbacks.OnLog?.(message);
  }
}

/**
 * Resolves scripts with a one-off {@link VersionFolderResolver}.
 *
 * @param request - Root directory, optional target version, filter and encoding
 * @param fileSystem - Filesystem to read from; defaults to the local disk
 */
export function ResolveVersionFolders(
  request: ResolutionRequest,
  fileSystem?: FileSystemProvider
): Promise<SqlScript[]> {
  return new VersionFolderResolver(fileSystem).Resolve(request);
}

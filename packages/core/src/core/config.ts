/**
 * @module core/config
 * Resolution request types and defaults.
 */

import * as path from 'path';
import type { NameFilter } from '../scripts/types';
import type { ScriptEncoding } from '../scripts/decode';

/**
 * Describes one resolution pass over a directory of version folders.
 */
export interface ResolutionRequest {
  /**
   * Directory whose immediate subdirectories are the version folders.
   * Relative paths are resolved against the process working directory.
   *
   * @example `'./migrations'`
   */
  RootPath: string;

  /**
   * Inclusive upper bound on folder versions, e.g. `'2.1'`.
   *
   * When set, every folder name (after filtering) must parse as a version,
   * folders above the target are excluded, and two folders parsing to the
   * same version are an error. When omitted or empty, every folder is
   * included without parsing its name.
   */
  TargetVersion?: string | null;

  /**
   * Predicate applied to composite `folder/file` script names. With a
   * target version it is also applied to folder names, which is how folders
   * without a version number are kept out of a bounded resolution.
   */
  Filter?: NameFilter | null;

  /**
   * Encoding used to decode script files that carry no byte-order mark.
   * Defaults to `'utf-8'`.
   */
  Encoding?: ScriptEncoding;
}

/** A request with every default applied */
export interface ResolvedRequest {
  RootPath: string;
  TargetVersion: string | null;
  Filter: NameFilter | null;
  Encoding: ScriptEncoding;
}

/**
 * Merges a user-provided request with defaults.
 * @param request - Request as supplied by the caller
 * @returns Request with an absolute root and every optional field filled in
 */
export function resolveRequest(request: ResolutionRequest): ResolvedRequest {
  return {
    RootPath: path.resolve(request.RootPath),
    TargetVersion: request.TargetVersion ? request.TargetVersion : null,
    Filter: request.Filter ?? null,
    Encoding: request.Encoding ?? 'utf-8',
  };
}

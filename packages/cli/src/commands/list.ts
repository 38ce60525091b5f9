/**
 * @module commands/list
 * Implementation of the `verfold list` CLI command.
 */

import { VersionFolderResolver } from '@verfold/core';
import type { ResolutionRequest } from '@verfold/core';
import {
  PrintScriptTable,
  PrintScriptContents,
  LogFolderAccepted,
  LogFolderSkipped,
  LogInfo,
  LogSuccess,
  LogError,
  formatElapsed,
} from '../formatting';

/**
 * Output switches for the list command.
 */
export interface ListOptions {
  /** Suppress per-folder output, show the table and summary only */
  Quiet: boolean;

  /** Print every script's contents after the table */
  ShowContents: boolean;
}

/**
 * Executes the list command: resolves and prints the scripts under the root.
 *
 * @param request - Resolved resolution request
 * @param options - Output switches
 * @returns Whether resolution succeeded
 */
export async function RunList(request: ResolutionRequest, options: ListOptions): Promise<boolean> {
  const resolver = new VersionFolderResolver();
  if (!options.Quiet) {
    resolver.OnProgress({
      OnLog: LogInfo,
      OnFolderAccepted: LogFolderAccepted,
      OnFolderSkipped: LogFolderSkipped,
    });
  }

  const startTime = Date.now();

  try {
    const scripts = await resolver.Resolve(request);
    console.log();
    PrintScriptTable(scripts);

    if (options.ShowContents) {
      PrintScriptContents(scripts);
    }

    const bound = request.TargetVersion ? ` up to version ${request.TargetVersion}` : '';
    LogSuccess(`${scripts.length} script(s) resolved${bound} in ${formatElapsed(Date.now() - startTime)}`);
    console.log();
    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    console.log();
    return false;
  }
}

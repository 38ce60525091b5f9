/**
 * @module scripts/folder-loader
 * Loads the `.sql` scripts of a single version folder.
 */

import * as path from 'path';
import type { FileSystemProvider } from '../fs/types';
import { ScriptReadError } from '../core/errors';
import type { SqlScript, NameFilter } from './types';
import { DecodeScriptContent } from './decode';
import type { ScriptEncoding } from './decode';

/** Glob selecting script files inside a version folder */
export const SCRIPT_FILE_PATTERN = '*.sql';

/**
 * Everything the loader needs besides the folder name.
 */
export interface FolderLoadContext {
  FileSystem: FileSystemProvider;
  RootPath: string;
  Filter: NameFilter | null;
  Encoding: ScriptEncoding;
  /** Called after each script is read */
  OnScriptLoaded?: (script: SqlScript) => void;
}

/**
 * Reads every script directly inside `root/folderName`.
 *
 * Scripts are named `folderName/fileName` so that files with the same name in
 * different folders stay unique. When a filter is configured it is applied to
 * that composite name. Files are read one at a time, in enumeration order.
 *
 * @throws ScriptReadError if the folder cannot be listed or any file cannot be read
 */
export async function LoadFolderScripts(
  folderName: string,
  context: FolderLoadContext
): Promise<SqlScript[]> {
  const folderPath = path.join(context.RootPath, folderName);

  const fileNames = await withReadError(folderPath, `Cannot list scripts in "${folderPath}"`, () =>
    context.FileSystem.ListFiles(folderPath, SCRIPT_FILE_PATTERN)
  );

  let names = fileNames.map((fileName) => ({
    FileName: fileName,
    ScriptName: `${folderName}/${fileName}`,
  }));

  // filter on folder/file combination
  const filter = context.Filter;
  if (filter) {
    names = names.filter((n) => filter(n.ScriptName));
  }

  const scripts: SqlScript[] = [];
  for (const { FileName, ScriptName } of names) {
    const filePath = path.join(folderPath, FileName);
    const bytes = await withReadError(filePath, `Cannot read script "${filePath}"`, () =>
      context.FileSystem.ReadFile(filePath)
    );

    const script: SqlScript = {
      Name: ScriptName,
      Contents: DecodeScriptContent(bytes, context.Encoding),
    };
    scripts.push(script);
    context.OnScriptLoaded?.(script);
  }

  return scripts;
}

/**
 * Runs a filesystem operation, converting any failure into a {@link ScriptReadError}.
 */
export async function withReadError<T>(
  targetPath: string,
  message: string,
  operation: () => Promise<T>
): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    throw new ScriptReadError(targetPath, `${message}: ${cause.message}`, cause);
  }
}

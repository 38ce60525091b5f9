/**
 * @module commands/parse
 * Implementation of the `verfold parse` CLI command.
 */

import chalk from 'chalk';
import { TryParseVersion } from '@verfold/core';

/**
 * Executes the parse command: shows the version each text parses to.
 *
 * @param texts - Folder names or version strings to parse
 * @returns Whether every text parsed
 */
export function RunParse(texts: string[]): boolean {
  let allParsed = true;

  for (const text of texts) {
    const version = TryParseVersion(text);
    if (version) {
      console.log(`  ${JSON.stringify(text)} ${chalk.gray('→')} ${chalk.green(version.toString())}`);
    } else {
      allParsed = false;
      console.log(`  ${JSON.stringify(text)} ${chalk.gray('→')} ${chalk.red('not a version')}`);
    }
  }

  console.log();
  return allParsed;
}

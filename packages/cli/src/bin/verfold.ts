#!/usr/bin/env tsx
/**
 * @module bin/verfold
 * CLI entry point for Verfold.
 *
 * Usage:
 *   verfold list [options]
 *   verfold parse <text...>
 */

import { Command } from 'commander';
import type { ResolutionRequest } from '@verfold/core';
import { LoadConfig } from '../config-loader';
import type { CLIOptions } from '../config-loader';
import { PrintBanner, LogError } from '../formatting';
import { RunList } from '../commands/list';
import { RunParse } from '../commands/parse';

/**
 * Options commander collects for the `list` command.
 */
interface ListCommandOptions {
  root?: string;
  target?: string;
  filter?: string;
  encoding?: string;
  config?: string;
  showContents?: boolean;
  quiet?: boolean;
}

const program = new Command();

program
  .name('verfold')
  .description('Verfold — resolve migration scripts from version folders')
  .version('0.1.0');

// ─── Commands ───────────────────────────────────────────────────────

program
  .command('list')
  .description('Resolve and list the scripts in the version folders under the root')
  .option('-r, --root <path>', 'Directory containing the version folders')
  .option('-t, --target <version>', 'Exclude folders with a higher version')
  .option('-f, --filter <regex>', 'Only include folder and folder/file names matching this pattern')
  .option('-e, --encoding <encoding>', 'Encoding for scripts without a byte-order mark')
  .option('--config <path>', 'Path to config file')
  .option('--show-contents', 'Print the contents of every script')
  .option('-q, --quiet', 'Suppress per-folder output, show the table only')
  .action(async (opts: ListCommandOptions) => {
    PrintBanner();
    const success = await runList(opts);
    process.exit(success ? 0 : 1);
  });

program
  .command('parse')
  .description('Show the version each folder name parses to')
  .argument('<text...>', 'Folder names or version strings')
  .action((texts: string[]) => {
    const success = RunParse(texts);
    process.exit(success ? 0 : 1);
  });

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Loads configuration and runs the list command, reporting configuration errors.
 */
async function runList(opts: ListCommandOptions): Promise<boolean> {
  let request: ResolutionRequest;
  try {
    request = LoadConfig(mapOptions(opts));
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }

  return RunList(request, {
    Quiet: opts.quiet ?? false,
    ShowContents: opts.showContents ?? false,
  });
}

/**
 * Maps commander options to CLIOptions.
 */
function mapOptions(opts: ListCommandOptions): CLIOptions {
  return {
    Root: opts.root,
    TargetVersion: opts.target,
    Filter: opts.filter,
    Encoding: opts.encoding,
    Config: opts.config,
  };
}

// Run
program.parseAsync().catch((err: unknown) => {
  LogError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});

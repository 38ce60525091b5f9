/**
 * @module formatting
 * Console output formatting for the Verfold CLI.
 * Provides colored, structured output for resolved scripts and progress.
 */

import chalk from 'chalk';
import type { SqlScript, Version } from '@verfold/core';

/**
 * Prints the Verfold banner to the console.
 */
export function PrintBanner(): void {
  console.log(chalk.cyan.bold('\n  Verfold') + chalk.gray(' — version folder script resolver'));
  console.log(chalk.gray('  ─────────────────────────────────────────\n'));
}

/**
 * Formats the resolved script table for the `list` command.
 */
export function PrintScriptTable(scripts: SqlScript[]): void {
  if (scripts.length === 0) {
    console.log(chalk.yellow('  No scripts found.'));
    return;
  }

  // Header
  console.log(chalk.gray('  ') + padRight('#', 6) + padRight('Script', 70) + padRight('Lines', 8));
  console.log(chalk.gray('  ' + '─'.repeat(84)));

  scripts.forEach((script, index) => {
    console.log(
      '  ' +
        chalk.gray(padRight(String(index + 1), 6)) +
        padRight(truncate(script.Name, 68), 70) +
        chalk.gray(String(CountLines(script.Contents)))
    );
  });
  console.log();
}

/**
 * Prints each script's name followed by its contents.
 */
export function PrintScriptContents(scripts: SqlScript[]): void {
  for (const script of scripts) {
    console.log(chalk.cyan(`  -- ${script.Name}`));
    console.log(script.Contents);
    console.log();
  }
}

/**
 * Logs a folder whose scripts are being loaded.
 */
export function LogFolderAccepted(folderName: string, version: Version | null): void {
  const label = version ? chalk.gray(` (v${version.toString()})`) : '';
  console.log(chalk.gray('  ') + chalk.green('+ ') + folderName + label);
}

/**
 * Logs a folder excluded for being above the target version.
 */
export function LogFolderSkipped(folderName: string, version: Version): void {
  console.log(chalk.gray(`  - ${folderName} (v${version.toString()} is above the target version)`));
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray('  ') + message);
}

/**
 * Logs a success summary.
 */
export function LogSuccess(message: string): void {
  console.log(chalk.green('\n  ' + message));
}

/**
 * Logs an error message.
 */
export function LogError(message: string): void {
  console.log(chalk.red('\n  ERROR: ' + message));
}

/**
 * Counts the lines of a script. A trailing newline does not start a new line.
 */
export function CountLines(contents: string): number {
  if (contents.length === 0) {
    return 0;
  }
  const lines = contents.split(/\r\n|\r|\n/);
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
}

/**
 * Formats elapsed time in a human-readable way.
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

/**
 * Right-pads a string to a given width.
 */
function padRight(str: string, width: number): string {
  return str.length >= width ? str : str + ' '.repeat(width - str.length);
}

/**
 * Truncates a string to a maximum length, appending '...' if needed.
 */
function truncate(str: string, maxLen: number): string {
  return str.length <= maxLen ? str : str.substring(0, maxLen - 3) + '...';
}

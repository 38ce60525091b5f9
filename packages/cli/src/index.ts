/**
 * @module @verfold/cli
 *
 * CLI package for Verfold.
 * This module exports the config loader and command implementations
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig, CompileFilter } from './config-loader';
export type { CLIOptions, FileConfig } from './config-loader';
export { RunList } from './commands/list';
export type { ListOptions } from './commands/list';
export { RunParse } from './commands/parse';

/**
 * @module @floe/cli
 *
 * CLI package for Floe deployments.
 * This module exports the config loader and command implementations
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig } from './config-loader';
export type { CLIOptions, FileConfig } from './config-loader';
export { RunDeploy } from './commands/deploy';
export { RunValidate } from './commands/validate';

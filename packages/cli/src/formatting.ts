/**
 * @module formatting
 * Console output formatting for the Floe CLI.
 * Provides colored, structured output for deployment progress.
 */

import chalk from 'chalk';
import { ScriptResult, ValidateResult } from '@floe/core';

/**
 * Prints the Floe banner to the console.
 */
export function PrintBanner(version: string): void {
  console.log(chalk.cyan.bold('\n  Floe') + chalk.gray(` ${version} — Snowflake change scripts`));
  console.log(chalk.gray('  ─────────────────────────────────────────\n'));
}

/**
 * Logs a change script execution result under its "Applying" line.
 */
export function LogScriptEnd(result: ScriptResult): void {
  if (result.Success) {
    const seconds = result.Entry?.ExecutionTime ?? 0;
    console.log(chalk.green('    OK') + chalk.gray(` (${seconds}s, v${result.Script.Version}: ${result.Script.Description})`));
  } else {
    console.log(chalk.red('    FAILED') + chalk.gray(` (v${result.Script.Version}: ${result.Script.Description})`));
  }
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray('  ') + message);
}

/**
 * Logs a verbose-only detail message.
 */
export function LogDebug(message: string): void {
  console.log(chalk.gray('  ' + message));
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
 * Prints a summary banner after a failed deployment.
 * Successful runs already end with the runner's own summary lines.
 */
export function PrintFailureSummary(applied: number, errorMessage?: string): void {
  console.log();
  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log(chalk.red.bold('  FAILED') + chalk.gray(` — ${applied} change script(s) applied before failure`));
  if (errorMessage) {
    console.log(chalk.red(`  ${errorMessage}`));
  }
  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log();
}

/**
 * Prints the outcome of `floe validate`: a one-line pass, or every
 * mismatch between the change history and the scripts on disk.
 */
export function PrintValidationReport(result: ValidateResult): void {
  if (result.Valid) {
    console.log(chalk.green(`\n  ${result.RecordsChecked} recorded change script(s) match the files on disk`));
  } else {
    console.log(
      chalk.red.bold(`\n  ${result.Errors.length} problem(s) in ${result.RecordsChecked} recorded change script(s):`)
    );
    for (const error of result.Errors) {
      console.log(chalk.red('    - ') + error);
    }
  }
  console.log();
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

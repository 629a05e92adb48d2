#!/usr/bin/env node
/**
 * @module bin/floe
 * CLI entry point for Floe.
 *
 * Usage:
 *   floe [deploy] [options]
 *   floe validate [options]
 */

import { Command } from 'commander';
import { FloeConfig } from '@floe/core';
import { LoadConfig, CLIOptions } from '../config-loader';
import { PrintBanner, LogError } from '../formatting';
import { RunDeploy } from '../commands/deploy';
import { RunValidate } from '../commands/validate';

const VERSION = '0.1.0';

/**
 * Options as parsed by commander (camelCase of the long flag names).
 */
interface CommandOptions {
  rootFolder?: string;
  snowflakeAccount?: string;
  snowflakeUser?: string;
  privateKeyFile?: string;
  snowflakeRole?: string;
  snowflakeWarehouse?: string;
  changeHistoryTable?: string;
  verbose?: boolean;
  config?: string;
}

const program = new Command();

program
  .name('floe')
  .description('Apply versioned SQL change scripts to a Snowflake account, each exactly once')
  .version(VERSION);

// ─── Shared Options ─────────────────────────────────────────────────

function addSharedOptions(cmd: Command): Command {
  return cmd
    .option('-f, --root-folder <path>', 'The root folder for the database change scripts (default: ".")')
    .option('-a, --snowflake-account <account>', 'The name[.region[.provider]] of the Snowflake account (e.g. ly12345.us-east-2.aws)')
    .option('-u, --snowflake-user <user>', 'The name of the Snowflake user (e.g. DEPLOYER)')
    .option('-k, --private-key-file <path>', 'Path to a private key in PEM format; requires SNOWSQL_PRIVATE_KEY_PASSPHRASE')
    .option('-r, --snowflake-role <role>', 'The name of the role to use (e.g. DEPLOYER_ROLE)')
    .option('-w, --snowflake-warehouse <warehouse>', 'The name of the warehouse to use (e.g. DEPLOYER_WAREHOUSE)')
    .option('-c, --change-history-table <name>', 'Override the change history table (e.g. METADATA.FLOE.CHANGE_HISTORY)')
    .option('-v, --verbose', 'Print SQL, ignored files and skipped scripts')
    .option('--config <path>', 'Path to config file');
}

// ─── Commands ───────────────────────────────────────────────────────

addSharedOptions(
  program
    .command('deploy', { isDefault: true })
    .description('Apply every change script newer than the most recently applied one')
).action(async (opts: CommandOptions) => {
  await runCommand(opts, RunDeploy);
});

addSharedOptions(
  program
    .command('validate')
    .description('Check recorded checksums against the change scripts on disk')
).action(async (opts: CommandOptions) => {
  await runCommand(opts, RunValidate);
});

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Loads configuration, runs a command and exits with its status.
 */
async function runCommand(
  opts: CommandOptions,
  command: (config: FloeConfig) => Promise<boolean>
): Promise<void> {
  PrintBanner(VERSION);

  let success = false;
  try {
    const config = LoadConfig(mapOptions(opts));
    success = await command(config);
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
  }

  process.exit(success ? 0 : 1);
}

/**
 * Maps commander options to CLIOptions.
 */
function mapOptions(opts: CommandOptions): CLIOptions {
  return {
    RootFolder: opts.rootFolder,
    Account: opts.snowflakeAccount,
    User: opts.snowflakeUser,
    PrivateKeyFile: opts.privateKeyFile,
    Role: opts.snowflakeRole,
    Warehouse: opts.snowflakeWarehouse,
    ChangeHistoryTable: opts.changeHistoryTable,
    Verbose: opts.verbose,
    Config: opts.config,
  };
}

// Run
program.parseAsync().catch((err: unknown) => {
  LogError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});

/**
 * @module config-loader
 * Loads Floe configuration from CLI flags, environment variables and files.
 *
 * Configuration is merged in order of precedence (highest first):
 * 1. CLI flags
 * 2. Environment variables
 * 3. .env file in the working directory (via dotenv)
 * 4. Config file (floe.json or floe.config.json)
 * 5. Built-in defaults
 *
 * Nothing is written back into `process.env`.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { ConfigurationError, FloeConfig, ResolveCredentials } from '@floe/core';

/**
 * Configuration file names searched in order.
 */
const CONFIG_FILE_NAMES = ['floe.json', 'floe.config.json'];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Root folder for change scripts */
  RootFolder?: string;

  /** Snowflake account identifier */
  Account?: string;

  /** Snowflake user */
  User?: string;

  /** Path to a PEM private key */
  PrivateKeyFile?: string;

  /** Snowflake role */
  Role?: string;

  /** Snowflake warehouse */
  Warehouse?: string;

  /** Change history table override (1, 2 or 3 part name) */
  ChangeHistoryTable?: string;

  /** Verbose output */
  Verbose?: boolean;

  /** Path to config file */
  Config?: string;
}

/**
 * Settings a config file may hold. Credentials never come from the file.
 */
export interface FileConfig {
  RootFolder?: string;
  Account?: string;
  User?: string;
  PrivateKeyFile?: string;
  Role?: string;
  Warehouse?: string;
  ChangeHistoryTable?: string;
  Verbose?: boolean;
}

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param env - Environment variables (defaults to `process.env`)
 * @param cwd - Working directory for config file and .env discovery
 * @returns Merged FloeConfig
 * @throws ConfigurationError if required settings or credentials are missing
 */
export function LoadConfig(
  cliOptions: CLIOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): FloeConfig {
  // Real environment variables win over .env entries
  const mergedEnv: NodeJS.ProcessEnv = { ...loadDotEnv(cwd), ...env };
  const fileConfig = loadConfigFile(cliOptions.Config, cwd);

  const account = cliOptions.Account ?? mergedEnv.SNOWFLAKE_ACCOUNT ?? fileConfig?.Account;
  const user = cliOptions.User ?? mergedEnv.SNOWFLAKE_USER ?? fileConfig?.User;
  const role = cliOptions.Role ?? mergedEnv.SNOWFLAKE_ROLE ?? fileConfig?.Role;
  const warehouse = cliOptions.Warehouse ?? mergedEnv.SNOWFLAKE_WAREHOUSE ?? fileConfig?.Warehouse;

  if (!account) {
    throw new ConfigurationError(
      'Snowflake account is required. Set via --snowflake-account, SNOWFLAKE_ACCOUNT env var, or config file.'
    );
  }
  if (!user) {
    throw new ConfigurationError(
      'Snowflake user is required. Set via --snowflake-user, SNOWFLAKE_USER env var, or config file.'
    );
  }
  if (!role) {
    throw new ConfigurationError(
      'Snowflake role is required. Set via --snowflake-role, SNOWFLAKE_ROLE env var, or config file.'
    );
  }
  if (!warehouse) {
    throw new ConfigurationError(
      'Snowflake warehouse is required. Set via --snowflake-warehouse, SNOWFLAKE_WAREHOUSE env var, or config file.'
    );
  }

  const privateKeyFile = cliOptions.PrivateKeyFile ?? fileConfig?.PrivateKeyFile;

  return {
    Connection: {
      Account: account,
      User: user,
      Role: role,
      Warehouse: warehouse,
      Credentials: ResolveCredentials(privateKeyFile, mergedEnv),
    },
    Migrations: {
      RootFolder: cliOptions.RootFolder
        ?? mergedEnv.FLOE_ROOT_FOLDER
        ?? fileConfig?.RootFolder
        ?? '.',
      ChangeHistoryTable: cliOptions.ChangeHistoryTable
        ?? mergedEnv.FLOE_CHANGE_HISTORY_TABLE
        ?? fileConfig?.ChangeHistoryTable,
    },
    Verbose: cliOptions.Verbose ?? fileConfig?.Verbose ?? false,
  };
}

/**
 * Reads `.env` from the working directory without touching `process.env`.
 */
function loadDotEnv(cwd: string): Record<string, string> {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return {};
  }
  return dotenv.parse(fs.readFileSync(envPath));
}

/**
 * Searches for and loads a config file.
 */
function loadConfigFile(explicitPath: string | undefined, cwd: string): FileConfig | null {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
    throw new ConfigurationError(`Config file not found: ${fullPath}`);
  }

  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
  }

  return null;
}

/**
 * Loads a single JSON config file.
 */
function loadFile(filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return normalizeConfig(raw, filePath);
}

/**
 * Known config keys in camelCase, mapped to their PascalCase names.
 * Both casings are accepted in config files.
 */
const KEY_MAP: Record<string, keyof FileConfig> = {
  rootFolder: 'RootFolder',
  account: 'Account',
  user: 'User',
  privateKeyFile: 'PrivateKeyFile',
  role: 'Role',
  warehouse: 'Warehouse',
  changeHistoryTable: 'ChangeHistoryTable',
  verbose: 'Verbose',
};

const STRING_KEYS: ReadonlyArray<Exclude<keyof FileConfig, 'Verbose'>> = [
  'RootFolder',
  'Account',
  'User',
  'PrivateKeyFile',
  'Role',
  'Warehouse',
  'ChangeHistoryTable',
];

/**
 * Normalizes config keys to PascalCase and checks value types.
 * Unknown keys are ignored.
 */
function normalizeConfig(raw: object, filePath: string): FileConfig {
  const values = new Map<string, unknown>();
  for (const [key, value] of Object.entries(raw)) {
    values.set(KEY_MAP[key] ?? key, value);
  }

  const config: FileConfig = {};
  for (const key of STRING_KEYS) {
    const value = values.get(key);
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string') {
      throw new ConfigurationError(`Config file ${filePath}: "${key}" must be a string`);
    }
    config[key] = value;
  }

  const verbose = values.get('Verbose');
  if (verbose !== undefined) {
    if (typeof verbose !== 'boolean') {
      throw new ConfigurationError(`Config file ${filePath}: "Verbose" must be a boolean`);
    }
    config.Verbose = verbose;
  }

  return config;
}

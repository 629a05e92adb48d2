/**
 * @module core/config
 * Floe configuration types and defaults.
 */

import * as path from 'path';
import { ConnectionConfig } from '../db/types';
import { HistoryTableLocation } from '../history/types';
import { ConfigurationError } from './errors';

/**
 * Location of the change history table when no override is given.
 */
export const DEFAULT_HISTORY_TABLE: Readonly<HistoryTableLocation> = {
  Database: 'METADATA',
  Schema: 'FLOE',
  Table: 'CHANGE_HISTORY',
};

/**
 * Complete configuration for a Floe run.
 */
export interface FloeConfig {
  /** Snowflake account, session and credentials */
  Connection: ConnectionConfig;

  /** Change script discovery and history settings */
  Migrations: MigrationConfig;

  /**
   * When true, the runner reports detail through `OnDebug`: SQL text,
   * ignored files, skipped scripts. Defaults to false.
   */
  Verbose?: boolean;
}

/**
 * Configuration for change script discovery and the history table.
 */
export interface MigrationConfig {
  /**
   * Folder scanned recursively for change scripts.
   * Relative paths resolve against the working directory. Defaults to `'.'`.
   */
  RootFolder?: string;

  /**
   * Override for the change history table, in one, two or three part form:
   * `TABLE`, `SCHEMA.TABLE` or `DATABASE.SCHEMA.TABLE`. Parts left out keep
   * their defaults (`METADATA.FLOE.CHANGE_HISTORY`).
   *
   * @example `'DEPLOY.HISTORY.CHANGES'`
   */
  ChangeHistoryTable?: string;
}

/**
 * Configuration with every default applied.
 */
export interface ResolvedFloeConfig {
  Connection: ConnectionConfig;
  Migrations: {
    /** Absolute path of the root folder */
    RootFolder: string;
    ChangeHistoryTable: HistoryTableLocation;
  };
  Verbose: boolean;
}

/**
 * Merges user-provided config with defaults.
 *
 * @param config - Configuration provided by the user
 * @returns Complete configuration with all defaults applied
 * @throws ConfigurationError if the change history table override is malformed
 */
export function resolveConfig(config: FloeConfig): ResolvedFloeConfig {
  return {
    Connection: config.Connection,
    Migrations: {
      RootFolder: path.resolve(config.Migrations.RootFolder ?? '.'),
      ChangeHistoryTable: ResolveHistoryTableLocation(config.Migrations.ChangeHistoryTable),
    },
    Verbose: config.Verbose ?? false,
  };
}

/**
 * Resolves the change history table location from an optional dotted
 * override. Every part is upper-cased.
 *
 * @throws ConfigurationError for more than three parts or an empty part
 */
export function ResolveHistoryTableLocation(override?: string): HistoryTableLocation {
  const location: HistoryTableLocation = { ...DEFAULT_HISTORY_TABLE };
  if (override === undefined) {
    return location;
  }

  const parts = override.trim().split('.').map((part) => part.toUpperCase());
  if (parts.length > 3 || parts.some((part) => part.length === 0)) {
    throw new ConfigurationError(`Invalid change history table name: ${override}`);
  }

  const [table, schema, database] = parts.reverse();
  location.Table = table;
  if (schema !== undefined) {
    location.Schema = schema;
  }
  if (database !== undefined) {
    location.Database = database;
  }

  return location;
}

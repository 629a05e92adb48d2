/**
 * @module history/types
 * Type definitions for the change history table and its rows.
 */

import { ScriptType } from '../migration/types';

/**
 * Where the change history table lives: `DATABASE.SCHEMA.TABLE`.
 * Names are stored upper-case, Snowflake's default for unquoted identifiers.
 */
export interface HistoryTableLocation {
  Database: string;
  Schema: string;
  Table: string;
}

/**
 * STATUS column value. Only successful applications are ever recorded.
 */
export type HistoryStatus = 'Success';

/**
 * A row to append to the change history table. INSTALLED_ON is assigned by
 * the server at insert time and so is not part of the entry.
 */
export interface HistoryEntry {
  /** Version string of the applied script */
  Version: string;

  /** Human-readable description derived from the filename */
  Description: string;

  /** Script filename */
  Script: string;

  /** Script kind (`V`) */
  ScriptType: ScriptType;

  /** Lowercase hex SHA-224 of the normalized script body */
  Checksum: string;

  /** Execution time in whole seconds */
  ExecutionTime: number;

  /** Outcome of the application */
  Status: HistoryStatus;

  /** Snowflake user who applied the script */
  InstalledBy: string;
}

/**
 * A single row read back from the change history table.
 * Rows written by other tools may hold values Floe would never write,
 * so the row fields are looser than {@link HistoryEntry}.
 */
export interface HistoryRecord {
  Version: string;
  Description: string;
  Script: string;
  ScriptType: string;
  Checksum: string | null;
  ExecutionTime: number;
  Status: string;
  InstalledBy: string;

  /** When the script was applied; null if the column is empty */
  InstalledOn: Date | null;
}

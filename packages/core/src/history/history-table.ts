/**
 * @module history/history-table
 * Manages the change history table: creating it (and its database and
 * schema) if missing, reading applied versions, and appending records.
 *
 * Rows are only ever appended. Floe never updates, deletes or alters the
 * table once it exists.
 */

import { SqlExecutor, SqlRow } from '../db/types';
import { HistoryEntry, HistoryRecord, HistoryTableLocation } from './types';

/**
 * Column list shared by the CREATE and INSERT statements, in table order.
 */
const COLUMNS = [
  'VERSION',
  'DESCRIPTION',
  'SCRIPT',
  'SCRIPT_TYPE',
  'CHECKSUM',
  'EXECUTION_TIME',
  'STATUS',
  'INSTALLED_BY',
  'INSTALLED_ON',
] as const;

/**
 * Reads and writes the change history table at a fixed location.
 *
 * Every method issues its statements through the executor, which scopes
 * one connection to each statement.
 */
export class HistoryTable {
  private readonly executor: SqlExecutor;
  private readonly location: HistoryTableLocation;

  /**
   * @param executor - Statement transport
   * @param location - Database, schema and table names (upper-case)
   */
  constructor(executor: SqlExecutor, location: HistoryTableLocation) {
    this.executor = executor;
    this.location = location;
  }

  /**
   * The table name qualified by schema, for use inside its database:
   * `"SCHEMA"."TABLE"`.
   */
  get QualifiedName(): string {
    return `${quoteIdentifier(this.location.Schema)}.${quoteIdentifier(this.location.Table)}`;
  }

  /**
   * The location in dotted form for display: `DATABASE.SCHEMA.TABLE`.
   */
  get DisplayName(): string {
    return `${this.location.Database}.${this.location.Schema}.${this.location.Table}`;
  }

  /**
   * Creates the database, schema and table if they don't exist, in that
   * order. Safe to call on every run.
   */
  async EnsureExists(): Promise<void> {
    await this.executor.Execute({
      SQL: `CREATE DATABASE IF NOT EXISTS ${quoteIdentifier(this.location.Database)}`,
    });

    await this.executor.Execute({
      Database: this.location.Database,
      SQL: `CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(this.location.Schema)}`,
    });

    await this.executor.Execute({
      Database: this.location.Database,
      SQL:
        `CREATE TABLE IF NOT EXISTS ${this.QualifiedName} (` +
        'VERSION VARCHAR, DESCRIPTION VARCHAR, SCRIPT VARCHAR, SCRIPT_TYPE VARCHAR, ' +
        'CHECKSUM VARCHAR, EXECUTION_TIME NUMBER, STATUS VARCHAR, INSTALLED_BY VARCHAR, ' +
        'INSTALLED_ON TIMESTAMP_LTZ)',
    });
  }

  /**
   * Returns every recorded VERSION, in no particular order.
   */
  async GetAppliedVersions(): Promise<string[]> {
    const rows = await this.executor.Execute({
      Database: this.location.Database,
      SQL: `SELECT VERSION FROM ${this.QualifiedName}`,
    });

    const versions: string[] = [];
    for (const row of rows) {
      if (row.VERSION !== null && row.VERSION !== undefined) {
        versions.push(String(row.VERSION));
      }
    }
    return versions;
  }

  /**
   * Returns all rows, oldest first.
   */
  async GetAllRecords(): Promise<HistoryRecord[]> {
    const rows = await this.executor.Execute({
      Database: this.location.Database,
      SQL: `SELECT ${COLUMNS.join(', ')} FROM ${this.QualifiedName} ORDER BY INSTALLED_ON`,
    });

    return rows.map(mapRowToRecord);
  }

  /**
   * Appends one row for a successfully applied script.
   * Values are bound, never spliced into the statement text.
   */
  async InsertAppliedScript(entry: HistoryEntry): Promise<void> {
    await this.executor.Execute({
      Database: this.location.Database,
      SQL:
        `INSERT INTO ${this.QualifiedName} (${COLUMNS.join(', ')}) ` +
        'VALUES (?, ?, ?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)',
      Binds: [
        entry.Version,
        entry.Description,
        entry.Script,
        entry.ScriptType,
        entry.Checksum,
        entry.ExecutionTime,
        entry.Status,
        entry.InstalledBy,
      ],
    });
  }
}

/**
 * Quotes a Snowflake identifier. Names are already upper-case, so a quoted
 * name resolves to the same object as the bare name would.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Maps a raw result row to a typed HistoryRecord.
 */
function mapRowToRecord(row: SqlRow): HistoryRecord {
  return {
    Version: readString(row.VERSION),
    Description: readString(row.DESCRIPTION),
    Script: readString(row.SCRIPT),
    ScriptType: readString(row.SCRIPT_TYPE),
    Checksum: row.CHECKSUM === null || row.CHECKSUM === undefined ? null : String(row.CHECKSUM),
    ExecutionTime: Number(row.EXECUTION_TIME ?? 0),
    Status: readString(row.STATUS),
    InstalledBy: readString(row.INSTALLED_BY),
    InstalledOn: readDate(row.INSTALLED_ON),
  };
}

function readString(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

function readDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

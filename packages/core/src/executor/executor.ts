/**
 * @module executor/executor
 * Applies a single change script and records it in the change history.
 *
 * A script body is sent to Snowflake as one multi-statement request, with no
 * database selected: scripts name their objects fully or begin with `USE`.
 * Nothing is recorded unless the body ran without error.
 */

import * as fs from 'fs';
import { SqlExecutor } from '../db/types';
import { ChangeScript } from '../migration/types';
import { ComputeChecksum, NormalizeScriptContent } from '../migration/checksum';
import { HistoryTable } from '../history/history-table';
import { HistoryEntry } from '../history/types';
import { MigrationExecutionError, toError } from '../core/errors';

/** How much of a failing script to keep on the error. */
const FAILED_SQL_PREVIEW_LENGTH = 500;

/**
 * Returns the current time in milliseconds. Replaceable in tests.
 */
export type Clock = () => number;

/**
 * Applies one change script.
 *
 * Steps:
 * 1. Read the file and normalize it (trim, drop one trailing `;`)
 * 2. Checksum the normalized body
 * 3. Execute it if non-empty, timing the run to the nearest whole second
 * 4. Record a `Success` row in the change history
 *
 * @param executor - Statement transport
 * @param history - Change history table to record into
 * @param script - The script to apply
 * @param installedBy - Snowflake user recorded as INSTALLED_BY
 * @param clock - Time source for measuring execution
 * @returns The history entry that was recorded
 * @throws MigrationExecutionError if the script cannot be read, fails to run,
 *   or ran but could not be recorded
 */
export async function ApplyChangeScript(
  executor: SqlExecutor,
  history: HistoryTable,
  script: ChangeScript,
  installedBy: string,
  clock: Clock = Date.now
): Promise<HistoryEntry> {
  const content = await ReadScriptContent(script);
  const checksum = ComputeChecksum(content);

  let executionTime = 0;
  if (content.length > 0) {
    const startTime = clock();
    try {
      await executor.Execute({ SQL: content, MultiStatement: true });
    } catch (err) {
      const cause = toError(err);
      throw new MigrationExecutionError(
        script.Version,
        script.Name,
        `Failed to apply change script ${script.Name}: ${cause.message}`,
        content.substring(0, FAILED_SQL_PREVIEW_LENGTH),
        cause
      );
    }
    executionTime = Math.round((clock() - startTime) / 1000);
  }

  const entry: HistoryEntry = {
    Version: script.Version,
    Description: script.Description,
    Script: script.Name,
    ScriptType: script.Type,
    Checksum: checksum,
    ExecutionTime: executionTime,
    Status: 'Success',
    InstalledBy: installedBy,
  };

  try {
    await history.InsertAppliedScript(entry);
  } catch (err) {
    const cause = toError(err);
    throw new MigrationExecutionError(
      script.Version,
      script.Name,
      `Change script ${script.Name} was applied but could not be recorded in ` +
        `${history.DisplayName}: ${cause.message}`,
      undefined,
      cause
    );
  }

  return entry;
}

/**
 * Reads a script from disk and returns its normalized body.
 * Line endings are converted to `\n` first, so a checkout with CRLF
 * endings runs and checksums the same as one with LF endings.
 */
export async function ReadScriptContent(script: ChangeScript): Promise<string> {
  try {
    const raw = await fs.promises.readFile(script.FullPath, 'utf-8');
    return NormalizeScriptContent(raw.replace(/\r\n?/g, '\n'));
  } catch (err) {
    const cause = toError(err);
    throw new MigrationExecutionError(
      script.Version,
      script.Name,
      `Cannot read change script ${script.FullPath}: ${cause.message}`,
      undefined,
      cause
    );
  }
}

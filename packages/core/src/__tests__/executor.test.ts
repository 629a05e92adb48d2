import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ApplyChangeScript, ReadScriptContent } from '../executor/executor';
import { HistoryTable } from '../history/history-table';
import { ParseChangeScriptFilename } from '../migration/parser';
import { ComputeChecksum } from '../migration/checksum';
import { MigrationExecutionError } from '../core/errors';
import { CreateScriptFolder, InMemorySnowflake, RemoveScriptFolder } from './helpers/in-memory-snowflake';

const LOCATION = { Database: 'METADATA', Schema: 'FLOE', Table: 'CHANGE_HISTORY' };

/** Clock that advances by the given steps on each call. */
function steppingClock(...times: number[]): () => number {
  let index = 0;
  return () => times[Math.min(index++, times.length - 1)];
}

describe('ApplyChangeScript', () => {
  let root: string;
  let snowflake: InMemorySnowflake;
  let history: HistoryTable;

  beforeEach(() => {
    root = CreateScriptFolder({
      'V1__init.sql': '\n  CREATE TABLE APP.PUBLIC.USERS (ID INT);\n',
      'V2__noop.sql': '  \n',
      'V3__double.sql': 'SELECT 1;;',
      'V4__broken.sql': 'CREATE TABEL OOPS',
      'V5__lf.sql': 'CREATE TABLE APP.PUBLIC.T (A INT);\nSELECT 1;\n',
      'V6__crlf.sql': 'CREATE TABLE APP.PUBLIC.T (A INT);\r\nSELECT 1;\r\n',
    });
    snowflake = new InMemorySnowflake();
    history = new HistoryTable(snowflake, LOCATION);
  });

  afterEach(() => {
    RemoveScriptFolder(root);
  });

  function script(name: string) {
    return ParseChangeScriptFilename(path.join(root, name));
  }

  it('runs the normalized body and records it', async () => {
    const recorded = await ApplyChangeScript(
      snowflake,
      history,
      script('V1__init.sql'),
      'DEPLOYER',
      steppingClock(1000, 2600)
    );

    expect(snowflake.Requests[0]).toEqual({
      SQL: 'CREATE TABLE APP.PUBLIC.USERS (ID INT)',
      MultiStatement: true,
    });
    expect(recorded).toEqual({
      Version: '1',
      Description: 'Init',
      Script: 'V1__init.sql',
      ScriptType: 'V',
      Checksum: ComputeChecksum('CREATE TABLE APP.PUBLIC.USERS (ID INT)'),
      ExecutionTime: 2,
      Status: 'Success',
      InstalledBy: 'DEPLOYER',
    });
    expect(snowflake.RecordedVersions).toEqual(['1']);
  });

  it('rounds the duration to whole seconds', async () => {
    const recorded = await ApplyChangeScript(
      snowflake,
      history,
      script('V1__init.sql'),
      'DEPLOYER',
      steppingClock(0, 1499)
    );
    expect(recorded.ExecutionTime).toBe(1);
  });

  it('records an empty script without running it', async () => {
    const recorded = await ApplyChangeScript(snowflake, history, script('V2__noop.sql'), 'DEPLOYER');

    expect(snowflake.ExecutedScripts).toEqual([]);
    expect(recorded.ExecutionTime).toBe(0);
    expect(recorded.Checksum).toBe(ComputeChecksum(''));
    expect(snowflake.RecordedVersions).toEqual(['2']);
  });

  it('drops only one trailing semicolon', async () => {
    await ApplyChangeScript(snowflake, history, script('V3__double.sql'), 'DEPLOYER');
    expect(snowflake.ExecutedScripts).toEqual(['SELECT 1;']);
  });

  it('gives LF and CRLF copies of a script the same checksum', async () => {
    const lf = await ApplyChangeScript(snowflake, history, script('V5__lf.sql'), 'DEPLOYER');
    const crlf = await ApplyChangeScript(snowflake, history, script('V6__crlf.sql'), 'DEPLOYER');

    expect(crlf.Checksum).toBe(lf.Checksum);
    expect(lf.Checksum).toBe(ComputeChecksum('CREATE TABLE APP.PUBLIC.T (A INT);\nSELECT 1'));
    expect(snowflake.ExecutedScripts).toEqual([
      'CREATE TABLE APP.PUBLIC.T (A INT);\nSELECT 1',
      'CREATE TABLE APP.PUBLIC.T (A INT);\nSELECT 1',
    ]);
  });

  it('records nothing when the script fails', async () => {
    snowflake.FailWhen = (sql) => sql.includes('TABEL');

    const error = await ApplyChangeScript(snowflake, history, script('V4__broken.sql'), 'DEPLOYER').catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(MigrationExecutionError);
    if (error instanceof MigrationExecutionError) {
      expect(error.Version).toBe('4');
      expect(error.Script).toBe('V4__broken.sql');
      expect(error.FailedSQL).toBe('CREATE TABEL OOPS');
      expect(error.message).toBe(
        "Failed to apply change script V4__broken.sql: SQL compilation error: syntax error line 1 at position 0 unexpected 'CREATE TAB'."
      );
    }
    expect(snowflake.History).toEqual([]);
  });

  it('reports a script that ran but could not be recorded', async () => {
    snowflake.FailInserts = true;

    await expect(
      ApplyChangeScript(snowflake, history, script('V1__init.sql'), 'DEPLOYER')
    ).rejects.toThrow(
      'Change script V1__init.sql was applied but could not be recorded in METADATA.FLOE.CHANGE_HISTORY: ' +
        'Insufficient privileges to operate on table'
    );
    expect(snowflake.ExecutedScripts).toHaveLength(1);
  });
});

describe('ReadScriptContent', () => {
  it('fails with the script path when the file is missing', async () => {
    const missing = ParseChangeScriptFilename('/nonexistent/floe/V9__gone.sql');

    await expect(ReadScriptContent(missing)).rejects.toThrow(
      'Cannot read change script /nonexistent/floe/V9__gone.sql'
    );
  });
});

import * as path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { Floe, RunState } from '../core/floe';
import { FloeConfig } from '../core/config';
import { ComputeChecksum } from '../migration/checksum';
import { ConfigurationError, DuplicateVersionError, MigrationExecutionError } from '../core/errors';
import { CreateScriptFolder, InMemorySnowflake, RemoveScriptFolder } from './helpers/in-memory-snowflake';

function configFor(rootFolder: string, overrides: Partial<FloeConfig> = {}): FloeConfig {
  return {
    Connection: {
      Account: 'test-account',
      User: 'DEPLOYER',
      Role: 'DEPLOYER_ROLE',
      Warehouse: 'DEPLOYER_WH',
      Credentials: { Kind: 'password', Password: 'test-secret' },
    },
    Migrations: { RootFolder: rootFolder },
    ...overrides,
  };
}

describe('Floe', () => {
  let root = '';

  afterEach(() => {
    if (root) {
      RemoveScriptFolder(root);
      root = '';
    }
  });

  describe('Migrate', () => {
    it('applies every script on a first run', async () => {
      root = CreateScriptFolder({
        'V2__add_col.sql': 'ALTER TABLE APP.PUBLIC.T ADD COLUMN B INT;',
        'V1__init.sql': 'CREATE TABLE APP.PUBLIC.T (A INT);',
      });
      const snowflake = new InMemorySnowflake();
      const logs: string[] = [];

      const result = await new Floe(configFor(root), { Executor: snowflake })
        .OnProgress({ OnLog: (message) => logs.push(message) })
        .Migrate();

      expect(result.Success).toBe(true);
      expect(result.State).toBe('Done');
      expect(result.ScriptsApplied).toBe(2);
      expect(result.ScriptsSkipped).toBe(0);
      expect(result.MaxAppliedVersion).toBeNull();
      expect(snowflake.ExecutedScripts).toEqual([
        'CREATE TABLE APP.PUBLIC.T (A INT)',
        'ALTER TABLE APP.PUBLIC.T ADD COLUMN B INT',
      ]);
      expect(snowflake.RecordedVersions).toEqual(['1', '2']);
      expect(logs).toEqual([
        `Using root folder ${root}`,
        'Using change history table METADATA.FLOE.CHANGE_HISTORY',
        'Max applied change script version: None',
        'Applying change script V1__init.sql',
        'Applying change script V2__add_col.sql',
        'Successfully applied 2 change scripts (skipping 0)',
        'Completed successfully',
      ]);
    });

    it('applies nothing on a second run', async () => {
      root = CreateScriptFolder({
        'V1__init.sql': 'CREATE TABLE APP.PUBLIC.T (A INT)',
        'V2__add_col.sql': 'ALTER TABLE APP.PUBLIC.T ADD COLUMN B INT',
      });
      const snowflake = new InMemorySnowflake();
      const floe = new Floe(configFor(root), { Executor: snowflake });

      await floe.Migrate();
      const second = await floe.Migrate();

      expect(second.Success).toBe(true);
      expect(second.ScriptsApplied).toBe(0);
      expect(second.ScriptsSkipped).toBe(2);
      expect(second.MaxAppliedVersion).toBe('2');
      expect(snowflake.ExecutedScripts).toHaveLength(2);
      expect(snowflake.RecordedVersions).toEqual(['1', '2']);
    });

    it('applies only scripts above the watermark', async () => {
      root = CreateScriptFolder({
        'V1.0__a.sql': 'SELECT 10',
        'V1.1__b.sql': 'SELECT 11',
        'V1.2__c.sql': 'SELECT 12',
        'V2.0__d.sql': 'SELECT 20',
      });
      const snowflake = new InMemorySnowflake();
      snowflake.History.push({ VERSION: '1.0' }, { VERSION: '1.1' });

      const result = await new Floe(configFor(root), { Executor: snowflake }).Migrate();

      expect(result.ScriptsApplied).toBe(2);
      expect(result.ScriptsSkipped).toBe(2);
      expect(result.MaxAppliedVersion).toBe('1.1');
      expect(result.Applied.map((entry) => entry.Version)).toEqual(['1.2', '2.0']);
      expect(snowflake.ExecutedScripts).toEqual(['SELECT 12', 'SELECT 20']);
    });

    it('never applies an older script added after a newer one was deployed', async () => {
      root = CreateScriptFolder({
        'V1.5__late.sql': 'SELECT 15',
        'V2.0__current.sql': 'SELECT 20',
      });
      const snowflake = new InMemorySnowflake();
      snowflake.History.push({ VERSION: '2.0' });

      const result = await new Floe(configFor(root), { Executor: snowflake }).Migrate();

      expect(result.ScriptsApplied).toBe(0);
      expect(result.ScriptsSkipped).toBe(2);
      expect(snowflake.ExecutedScripts).toEqual([]);
    });

    it('stops at the first failing script and keeps earlier ones recorded', async () => {
      root = CreateScriptFolder({
        'V1__init.sql': 'CREATE TABLE APP.PUBLIC.T (A INT)',
        'V2__broken.sql': 'CREATE TABEL OOPS',
        'V3__later.sql': 'SELECT 3',
      });
      const snowflake = new InMemorySnowflake();
      snowflake.FailWhen = (sql) => sql.includes('TABEL');
      const ended: Array<[string, boolean]> = [];

      const result = await new Floe(configFor(root), { Executor: snowflake })
        .OnProgress({ OnScriptEnd: (outcome) => ended.push([outcome.Script.Name, outcome.Success]) })
        .Migrate();

      expect(result.Success).toBe(false);
      expect(result.State).toBe('Failed');
      expect(result.FailedInState).toBe('Applying');
      expect(result.ScriptsApplied).toBe(1);
      expect(result.FailedScript?.Name).toBe('V2__broken.sql');
      expect(result.Error).toBeInstanceOf(MigrationExecutionError);
      expect(result.ErrorMessage).toMatch(/^Failed to apply change script V2__broken\.sql: /);
      expect(snowflake.RecordedVersions).toEqual(['1']);
      expect(snowflake.ExecutedScripts).toEqual(['CREATE TABLE APP.PUBLIC.T (A INT)']);
      expect(ended).toEqual([
        ['V1__init.sql', true],
        ['V2__broken.sql', false],
      ]);
    });

    it('resumes after the last recorded script once the failure is fixed', async () => {
      root = CreateScriptFolder({
        'V1__init.sql': 'SELECT 1',
        'V2__broken.sql': 'CREATE TABEL OOPS',
      });
      const snowflake = new InMemorySnowflake();
      snowflake.FailWhen = (sql) => sql.includes('TABEL');
      const floe = new Floe(configFor(root), { Executor: snowflake });

      await floe.Migrate();
      snowflake.FailWhen = () => false;
      const retry = await floe.Migrate();

      expect(retry.Success).toBe(true);
      expect(retry.Applied.map((entry) => entry.Version)).toEqual(['2']);
      expect(snowflake.RecordedVersions).toEqual(['1', '2']);
    });

    it('walks the run states in order', async () => {
      root = CreateScriptFolder({ 'V1__a.sql': 'SELECT 1', 'V2__b.sql': 'SELECT 2' });
      const states: string[] = [];

      await new Floe(configFor(root), { Executor: new InMemorySnowflake() })
        .OnProgress({
          OnStateChange: (state: RunState, index?: number) =>
            states.push(index === undefined ? state : `${state}(${index})`),
        })
        .Migrate();

      expect(states).toEqual(['HistoryReady', 'Cataloged', 'Planned', 'Applying(0)', 'Applying(1)', 'Done']);
    });

    it('fails on an invalid root folder before touching Snowflake', async () => {
      const missing = path.join(process.cwd(), 'no-such-folder-for-floe');
      const snowflake = new InMemorySnowflake();

      const result = await new Floe(configFor(missing), { Executor: snowflake }).Migrate();

      expect(result.Success).toBe(false);
      expect(result.FailedInState).toBe('Init');
      expect(result.Error).toBeInstanceOf(ConfigurationError);
      expect(result.ErrorMessage).toBe(`Invalid root folder: ${missing}`);
      expect(snowflake.Requests).toEqual([]);
    });

    it('fails on duplicate versions without applying anything', async () => {
      root = CreateScriptFolder({
        'V1__a.sql': 'SELECT 1',
        'V1__c.sql': 'SELECT 2',
        'notes.txt': 'not sql',
      });
      const snowflake = new InMemorySnowflake();

      const result = await new Floe(configFor(root), { Executor: snowflake }).Migrate();

      expect(result.Success).toBe(false);
      expect(result.FailedInState).toBe('HistoryReady');
      expect(result.Error).toBeInstanceOf(DuplicateVersionError);
      expect(snowflake.ExecutedScripts).toEqual([]);
      expect(snowflake.History).toEqual([]);
    });

    it('uses the configured change history table', async () => {
      root = CreateScriptFolder({ 'V1__a.sql': 'SELECT 1' });
      const snowflake = new InMemorySnowflake();
      const logs: string[] = [];

      await new Floe(
        configFor(root, { Migrations: { RootFolder: root, ChangeHistoryTable: 'ops.audit.deploys' } }),
        { Executor: snowflake }
      )
        .OnProgress({ OnLog: (message) => logs.push(message) })
        .Migrate();

      expect(logs[1]).toBe('Using change history table OPS.AUDIT.DEPLOYS');
      expect(snowflake.Requests[0].SQL).toBe('CREATE DATABASE IF NOT EXISTS "OPS"');
    });

    it('reports detail through OnDebug only when verbose', async () => {
      root = CreateScriptFolder({ 'V1__a.sql': 'SELECT 1', 'README.md': '# scripts' });
      const quiet: string[] = [];
      const verbose: string[] = [];

      await new Floe(configFor(root), { Executor: new InMemorySnowflake() })
        .OnProgress({ OnDebug: (message) => quiet.push(message) })
        .Migrate();
      await new Floe(configFor(root, { Verbose: true }), { Executor: new InMemorySnowflake() })
        .OnProgress({ OnDebug: (message) => verbose.push(message) })
        .Migrate();

      expect(quiet).toEqual([]);
      expect(verbose).toEqual([
        'Change history: []',
        `Ignoring non-change file ${path.join(root, 'README.md')}`,
      ]);
    });
  });

  describe('Validate', () => {
    it('passes when recorded checksums match the files', async () => {
      root = CreateScriptFolder({ 'V1__init.sql': 'SELECT 1;', 'V2__next.sql': 'SELECT 2' });
      const snowflake = new InMemorySnowflake();
      const floe = new Floe(configFor(root), { Executor: snowflake });
      await floe.Migrate();

      const result = await floe.Validate();

      expect(result).toEqual({ Valid: true, RecordsChecked: 2, Errors: [] });
    });

    it('reports an edited script and a missing script', async () => {
      root = CreateScriptFolder({ 'V1__init.sql': 'SELECT 100' });
      const snowflake = new InMemorySnowflake();
      snowflake.History.push(
        { VERSION: '1', DESCRIPTION: 'Init', CHECKSUM: ComputeChecksum('SELECT 1') },
        { VERSION: '2', DESCRIPTION: 'Removed', CHECKSUM: ComputeChecksum('SELECT 2') }
      );

      const result = await new Floe(configFor(root), { Executor: snowflake }).Validate();

      expect(result.Valid).toBe(false);
      expect(result.RecordsChecked).toBe(2);
      expect(result.Errors).toEqual([
        `Checksum mismatch for version 1 (V1__init.sql): expected ${ComputeChecksum('SELECT 1')} ` +
          `but computed ${ComputeChecksum('SELECT 100')}`,
        'Change script version 2 (Removed) was applied but is no longer found on disk',
      ]);
    });

    it('skips records without a checksum', async () => {
      root = CreateScriptFolder({ 'V1__init.sql': 'SELECT 1' });
      const snowflake = new InMemorySnowflake();
      snowflake.History.push({ VERSION: '1', DESCRIPTION: 'Init', CHECKSUM: null });

      const result = await new Floe(configFor(root), { Executor: snowflake }).Validate();

      expect(result.Valid).toBe(true);
    });
  });
});

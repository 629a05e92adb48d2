/**
 * @module core/floe
 * Main orchestrator for Floe deployments.
 *
 * The `Floe` class is the primary public API for programmatic usage.
 * It coordinates the change history, script discovery, planning and
 * application.
 *
 * @example
 * ```typescript
 * import { Floe, ResolveCredentials } from '@floe/core';
 *
 * const floe = new Floe({
 *   Connection: {
 *     Account: 'ly12345.us-east-2.aws',
 *     User: 'DEPLOYER',
 *     Role: 'DEPLOYER_ROLE',
 *     Warehouse: 'DEPLOYER_WH',
 *     Credentials: ResolveCredentials(undefined),
 *   },
 *   Migrations: { RootFolder: './sql' },
 * });
 *
 * const result = await floe.Migrate();
 * console.log(`Applied ${result.ScriptsApplied} change scripts`);
 * ```
 */

import * as fs from 'fs';
import { FloeConfig, ResolvedFloeConfig, resolveConfig } from './config';
import { ConfigurationError, toError } from './errors';
import { SnowflakeConnectionManager } from '../db/connection';
import { SqlExecutor } from '../db/types';
import { HistoryTable } from '../history/history-table';
import { HistoryEntry } from '../history/types';
import { DiscoverChangeScripts } from '../migration/scanner';
import { PlanChangeScripts } from '../migration/planner';
import { ChangeScript, ScriptCatalog } from '../migration/types';
import { MaxVersion } from '../migration/version';
import { ComputeChecksum } from '../migration/checksum';
import { ApplyChangeScript, Clock, ReadScriptContent } from '../executor/executor';

/**
 * Stages of a deployment run, in order. A run ends in `Done` or `Failed`.
 *
 * - `Init` — nothing has happened yet
 * - `HistoryReady` — history table exists and applied versions are loaded
 * - `Cataloged` — change scripts have been discovered
 * - `Planned` — pending scripts are known
 * - `Applying` — a pending script is being applied
 * - `Done` — every pending script was applied
 * - `Failed` — a step failed; later scripts were not attempted
 */
export type RunState =
  | 'Init'
  | 'HistoryReady'
  | 'Cataloged'
  | 'Planned'
  | 'Applying'
  | 'Done'
  | 'Failed';

/**
 * Result of a `Migrate()` operation.
 */
export interface MigrateResult {
  /** Final state of the run */
  State: 'Done' | 'Failed';

  /** Whether the run completed successfully */
  Success: boolean;

  /** The state the run was in when it failed */
  FailedInState?: RunState;

  /** Number of change scripts applied in this run */
  ScriptsApplied: number;

  /** Number of discovered scripts at or below the watermark */
  ScriptsSkipped: number;

  /** Highest version recorded before this run (null if none) */
  MaxAppliedVersion: string | null;

  /** History entries recorded in this run, in order */
  Applied: HistoryEntry[];

  /** The script that failed, if the run failed while applying */
  FailedScript?: ChangeScript;

  /** The error that stopped the run */
  Error?: Error;

  /** Error message if the run failed */
  ErrorMessage?: string;

  /** Total wall-clock time in milliseconds */
  TotalExecutionTimeMS: number;
}

/**
 * Result of a `Validate()` operation.
 */
export interface ValidateResult {
  /** Whether all validations passed */
  Valid: boolean;

  /** Number of history records checked */
  RecordsChecked: number;

  /** List of validation error messages */
  Errors: string[];
}

/**
 * Outcome of applying one script, passed to `OnScriptEnd`.
 */
export interface ScriptResult {
  Script: ChangeScript;
  Success: boolean;

  /** The recorded history entry, on success */
  Entry?: HistoryEntry;

  /** What went wrong, on failure */
  Error?: Error;
}

/**
 * Callback interface for observing deployment progress.
 */
export interface FloeCallbacks {
  /** Called when a change script starts executing */
  OnScriptStart?: (script: ChangeScript) => void;

  /** Called when a change script finishes (success or failure) */
  OnScriptEnd?: (result: ScriptResult) => void;

  /** Called for operator-facing log messages */
  OnLog?: (message: string) => void;

  /** Called for detail messages; only when `Verbose` is set */
  OnDebug?: (message: string) => void;

  /** Called on every state transition; `scriptIndex` is set while applying */
  OnStateChange?: (state: RunState, scriptIndex?: number) => void;
}

/**
 * Replaceable collaborators, mainly for tests.
 */
export interface FloeDependencies {
  /** Statement transport. Defaults to a Snowflake connection manager */
  Executor?: SqlExecutor;

  /** Time source for script durations. Defaults to `Date.now` */
  Clock?: Clock;
}

/**
 * The Floe deployment engine.
 *
 * - `Migrate()` — apply every change script above the watermark
 * - `Validate()` — check recorded checksums against the scripts on disk
 */
export class Floe {
  private readonly config: ResolvedFloeConfig;
  private readonly executor: SqlExecutor;
  private readonly clock: Clock;
  private readonly historyTable: HistoryTable;
  private callbacks: FloeCallbacks = {};

  /**
   * @throws ConfigurationError if the change history table override is malformed
   */
  constructor(config: FloeConfig, dependencies: FloeDependencies = {}) {
    this.config = resolveConfig(config);
    this.executor =
      dependencies.Executor ??
      new SnowflakeConnectionManager(this.config.Connection, (request) =>
        this.debug(`SQL query: ${request.SQL}`)
      );
    this.clock = dependencies.Clock ?? Date.now;
    this.historyTable = new HistoryTable(this.executor, this.config.Migrations.ChangeHistoryTable);
  }

  /**
   * Registers callbacks for observing progress.
   * Returns `this` for chaining.
   *
   * @example
   * ```typescript
   * const result = await floe
   *   .OnProgress({ OnLog: (msg) => console.log(msg) })
   *   .Migrate();
   * ```
   */
  OnProgress(callbacks: FloeCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Applies every pending change script.
   *
   * The workflow:
   * 1. Check the root folder
   * 2. Ensure the change history table exists and read applied versions
   * 3. Discover change scripts (fails on a duplicate version)
   * 4. Plan: everything above the highest applied version, ascending
   * 5. Apply and record each pending script, one at a time
   *
   * Never throws: a failure stops the run and is reported on the result.
   * Scripts applied before the failure stay applied and recorded.
   */
  async Migrate(): Promise<MigrateResult> {
    const startTime = Date.now();
    const applied: HistoryEntry[] = [];
    let state: RunState = 'Init';
    let maxAppliedVersion: string | null = null;
    let skipped = 0;
    let current: ChangeScript | undefined;

    const enter = (next: RunState, scriptIndex?: number): void => {
      state = next;
      this.callbacks.OnStateChange?.(next, scriptIndex);
    };

    try {
      const rootFolder = await this.checkRootFolder();
      this.log(`Using root folder ${rootFolder}`);

      await this.historyTable.EnsureExists();
      this.log(`Using change history table ${this.historyTable.DisplayName}`);

      const appliedVersions = await this.historyTable.GetAppliedVersions();
      maxAppliedVersion = MaxVersion(appliedVersions);
      this.log(`Max applied change script version: ${maxAppliedVersion ?? 'None'}`);
      this.debug(`Change history: ${JSON.stringify(appliedVersions)}`);
      enter('HistoryReady');

      const catalog = await this.discover(rootFolder);
      enter('Cataloged');

      const plan = PlanChangeScripts(catalog, appliedVersions);
      skipped = plan.Skipped.length;
      for (const script of plan.Skipped) {
        this.debug(
          `Skipping change script ${script.Name} because it's older than the most recently ` +
            `applied change (${plan.MaxAppliedVersion ?? 'None'})`
        );
      }
      enter('Planned');

      for (let i = 0; i < plan.Pending.length; i++) {
        current = plan.Pending[i];
        enter('Applying', i);
        this.log(`Applying change script ${current.Name}`);
        this.callbacks.OnScriptStart?.(current);

        const entry = await ApplyChangeScript(
          this.executor,
          this.historyTable,
          current,
          this.config.Connection.User,
          this.clock
        );
        applied.push(entry);
        this.callbacks.OnScriptEnd?.({ Script: current, Success: true, Entry: entry });
        current = undefined;
      }

      this.log(`Successfully applied ${applied.length} change scripts (skipping ${skipped})`);
      this.log('Completed successfully');
      enter('Done');

      return {
        State: 'Done',
        Success: true,
        ScriptsApplied: applied.length,
        ScriptsSkipped: skipped,
        MaxAppliedVersion: maxAppliedVersion,
        Applied: applied,
        TotalExecutionTimeMS: Date.now() - startTime,
      };
    } catch (err) {
      const error = toError(err);
      const failedInState = state;
      if (current) {
        this.callbacks.OnScriptEnd?.({ Script: current, Success: false, Error: error });
      }
      enter('Failed');

      return {
        State: 'Failed',
        Success: false,
        FailedInState: failedInState,
        ScriptsApplied: applied.length,
        ScriptsSkipped: skipped,
        MaxAppliedVersion: maxAppliedVersion,
        Applied: applied,
        FailedScript: current,
        Error: error,
        ErrorMessage: error.message,
        TotalExecutionTimeMS: Date.now() - startTime,
      };
    }
  }

  /**
   * Validates that applied change scripts match the files on disk.
   * Reports recorded versions with no script on disk and scripts whose
   * checksum differs from the recorded one.
   *
   * @throws ConfigurationError if the root folder is invalid
   * @throws DuplicateVersionError if two scripts share a version
   */
  async Validate(): Promise<ValidateResult> {
    const rootFolder = await this.checkRootFolder();
    this.log(`Using root folder ${rootFolder}`);

    await this.historyTable.EnsureExists();
    this.log(`Using change history table ${this.historyTable.DisplayName}`);

    const records = await this.historyTable.GetAllRecords();
    const catalog = await this.discover(rootFolder);

    const diskByVersion = new Map<string, ChangeScript>();
    for (const script of catalog.values()) {
      diskByVersion.set(script.Version, script);
    }

    const errors: string[] = [];
    for (const record of records) {
      const script = diskByVersion.get(record.Version);
      if (!script) {
        errors.push(
          `Change script version ${record.Version} (${record.Description}) ` +
            `was applied but is no longer found on disk`
        );
        continue;
      }

      if (record.Checksum === null) {
        continue;
      }

      const checksum = ComputeChecksum(await ReadScriptContent(script));
      if (checksum !== record.Checksum) {
        errors.push(
          `Checksum mismatch for version ${record.Version} (${script.Name}): ` +
            `expected ${record.Checksum} but computed ${checksum}`
        );
      }
    }

    return {
      Valid: errors.length === 0,
      RecordsChecked: records.length,
      Errors: errors,
    };
  }

  // ─── Private Methods ──────────────────────────────────────────────

  /**
   * Returns the absolute root folder, failing if it is not a directory.
   */
  private async checkRootFolder(): Promise<string> {
    const rootFolder = this.config.Migrations.RootFolder;
    const stats = await fs.promises.stat(rootFolder).catch((err: unknown) => {
      throw new ConfigurationError(`Invalid root folder: ${rootFolder}`, toError(err));
    });

    if (!stats.isDirectory()) {
      throw new ConfigurationError(`Invalid root folder: ${rootFolder}`);
    }
    return rootFolder;
  }

  private discover(rootFolder: string): Promise<ScriptCatalog> {
    return DiscoverChangeScripts(rootFolder, (filePath) =>
      this.debug(`Ignoring non-change file ${filePath}`)
    );
  }

  private log(message: string): void {
    this.callbacks.OnLog?.(message);
  }

  private debug(message: string): void {
    if (this.config.Verbose) {
      this.callbacks.OnDebug?.(message);
    }
  }
}

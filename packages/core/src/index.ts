/**
 * @module @floe/core
 *
 * Floe — versioned SQL change scripts for Snowflake, applied exactly once.
 *
 * ## Quick Start
 *
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
 *   Migrations: {
 *     RootFolder: './sql',
 *     ChangeHistoryTable: 'METADATA.FLOE.CHANGE_HISTORY',
 *   },
 * });
 *
 * const result = await floe.Migrate();
 * console.log(`Applied ${result.ScriptsApplied} change scripts`);
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { Floe } from './core/floe';
export type {
  FloeCallbacks,
  FloeDependencies,
  MigrateResult,
  RunState,
  ScriptResult,
  ValidateResult,
} from './core/floe';

// ─── Configuration ───────────────────────────────────────────────────
export { DEFAULT_HISTORY_TABLE, ResolveHistoryTableLocation, resolveConfig } from './core/config';
export type { FloeConfig, MigrationConfig, ResolvedFloeConfig } from './core/config';

// ─── Database ────────────────────────────────────────────────────────
export type {
  ConnectionConfig,
  ConnectionCredentials,
  KeyPairCredentials,
  PasswordCredentials,
  SqlBind,
  SqlExecutor,
  SqlRequest,
  SqlRow,
} from './db/types';
export { SnowflakeConnectionManager } from './db/connection';
export type { QueryCallback } from './db/connection';
export {
  ResolveCredentials,
  LoadPrivateKey,
  PASSWORD_ENV_VAR,
  PASSPHRASE_ENV_VAR,
} from './db/credentials';

// ─── Change Scripts ──────────────────────────────────────────────────
export type { ChangeScript, ChangePlan, ScriptCatalog, ScriptType } from './migration/types';
export { ParseChangeScriptFilename } from './migration/parser';
export { DiscoverChangeScripts } from './migration/scanner';
export type { IgnoredFileCallback } from './migration/scanner';
export { PlanChangeScripts } from './migration/planner';
export { ComputeChecksum, NormalizeScriptContent, CHECKSUM_ALGORITHM } from './migration/checksum';
export {
  ParseVersionKey,
  CompareVersionKeys,
  CompareVersions,
  SortByVersion,
  MaxVersion,
} from './migration/version';
export type { VersionKey, VersionSegment, VersionOrdering } from './migration/version';

// ─── Executor ────────────────────────────────────────────────────────
export { ApplyChangeScript, ReadScriptContent } from './executor/executor';
export type { Clock } from './executor/executor';

// ─── History ─────────────────────────────────────────────────────────
export { HistoryTable } from './history/history-table';
export type {
  HistoryEntry,
  HistoryRecord,
  HistoryStatus,
  HistoryTableLocation,
} from './history/types';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  FloeError,
  ConfigurationError,
  DuplicateVersionError,
  MigrationParseError,
  MigrationExecutionError,
  ConnectionError,
} from './core/errors';

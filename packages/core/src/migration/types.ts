/**
 * @module migration/types
 * Type definitions for change scripts and deployment plans.
 */

/**
 * The kind of a change script, taken from its filename prefix.
 * Only versioned (`V`) scripts exist: each runs once, forward only.
 */
export type ScriptType = 'V';

/**
 * A change script found on disk.
 * Holds only what the filename says; the content is read when the script is applied.
 */
export interface ChangeScript {
  /** The original filename (basename only), unique within a run */
  Name: string;

  /** Absolute path to the script on disk */
  FullPath: string;

  /** Script kind, from the filename prefix */
  Type: ScriptType;

  /** Raw version string from the filename (e.g., "1.2.0") */
  Version: string;

  /**
   * Human-readable description derived from the filename: underscores become
   * spaces, the first letter is upper-cased and the rest lower-cased.
   */
  Description: string;
}

/**
 * Every change script discovered in one pass, keyed by filename.
 */
export type ScriptCatalog = Map<string, ChangeScript>;

/**
 * The outcome of reconciling the catalog with the change history.
 */
export interface ChangePlan {
  /** Scripts above the watermark, ascending by version: the exact apply order */
  Pending: ChangeScript[];

  /** Scripts at or below the watermark, ascending by version */
  Skipped: ChangeScript[];

  /** Highest version recorded in the change history, or null when nothing is recorded */
  MaxAppliedVersion: string | null;
}

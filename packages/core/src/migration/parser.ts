/**
 * @module migration/parser
 * Parses change script filenames into structured metadata.
 *
 * The only accepted form is `V{version}__{description}.sql`. The leading
 * `V` and the `.sql` extension are case-sensitive. The version runs up to
 * the last `__` that still leaves a non-empty description, so
 * `V1__a__b.sql` has version `1__a` and description `B`.
 */

import * as path from 'path';
import { ChangeScript, ScriptType } from './types';
import { MigrationParseError } from '../core/errors';

/**
 * Groups:
 *  1. Script type prefix (`V`)
 *  2. Version (greedy, non-empty)
 *  3. Description (non-empty)
 */
const CHANGE_SCRIPT_PATTERN = /^(V)(.+)__(.+)\.sql$/;

/**
 * Parses a change script filename.
 *
 * @param filePath - Path to the file; only its basename is matched
 * @returns The change script described by the filename
 * @throws MigrationParseError if the filename is not a change script name
 *
 * @example
 * ```typescript
 * const script = ParseChangeScriptFilename('/repo/sql/V1.1__Add_ORDERS_table.sql');
 * // script.Version === '1.1'
 * // script.Description === 'Add orders table'
 * ```
 */
export function ParseChangeScriptFilename(filePath: string): ChangeScript {
  const filename = path.basename(filePath);
  const match = filename.trim().match(CHANGE_SCRIPT_PATTERN);

  if (!match) {
    throw new MigrationParseError(
      filename,
      `Cannot parse change script filename "${filename}". Expected format: V{version}__{description}.sql`
    );
  }

  const type: ScriptType = 'V';
  return {
    Name: filename,
    FullPath: filePath,
    Type: type,
    Version: match[2],
    Description: formatDescription(match[3]),
  };
}

/**
 * Converts a filename description segment to display text:
 * underscores to spaces, first letter upper-case, the rest lower-case.
 *
 * @param raw - Raw description from the filename (e.g., "Add_ORDERS_table")
 * @returns Formatted description (e.g., "Add orders table")
 */
function formatDescription(raw: string): string {
  const spaced = raw.replace(/_/g, ' ');
  return spaced.charAt(0).toUpperCase() + spaced.slice(1).toLowerCase();
}

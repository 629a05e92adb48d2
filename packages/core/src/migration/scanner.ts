/**
 * @module migration/scanner
 * Discovers change scripts on disk by recursively scanning the root folder.
 *
 * Every regular file is considered. Files whose names are not change
 * script names are skipped and reported through the optional callback;
 * two scripts with the same version abort the scan.
 */

import * as path from 'path';
import fg from 'fast-glob';
import { ChangeScript, ScriptCatalog } from './types';
import { ParseChangeScriptFilename } from './parser';
import { DuplicateVersionError, MigrationParseError } from '../core/errors';

/**
 * Callback for files that are not change scripts.
 */
export type IgnoredFileCallback = (filePath: string) => void;

/**
 * Recursively scans `root` and returns every change script, keyed by filename.
 *
 * Paths are visited in sorted order, so for a duplicate version the
 * "first" and "second" files are the same on every run.
 *
 * @param root - Directory to scan
 * @param onIgnored - Optional callback for files that are not change scripts
 * @returns Catalog of discovered scripts, in no particular order
 * @throws DuplicateVersionError if two scripts share a version
 *
 * @example
 * ```typescript
 * const catalog = await DiscoverChangeScripts('./sql');
 * console.log(`Found ${catalog.size} change scripts`);
 * ```
 */
export async function DiscoverChangeScripts(
  root: string,
  onIgnored?: IgnoredFileCallback
): Promise<ScriptCatalog> {
  const resolvedRoot = path.resolve(root);

  const files = await fg('**/*', {
    cwd: resolvedRoot,
    absolute: true,
    onlyFiles: true,
    dot: true,
  });
  files.sort();

  const catalog: ScriptCatalog = new Map();
  const pathsByVersion = new Map<string, string>();

  for (const filePath of files) {
    const script = tryParse(path.normalize(filePath));
    if (!script) {
      onIgnored?.(path.normalize(filePath));
      continue;
    }

    const firstPath = pathsByVersion.get(script.Version);
    if (firstPath !== undefined) {
      throw new DuplicateVersionError(script.Version, firstPath, script.FullPath);
    }

    pathsByVersion.set(script.Version, script.FullPath);
    catalog.set(script.Name, script);
  }

  return catalog;
}

/**
 * Parses a path as a change script, returning null for names that do not match.
 */
function tryParse(filePath: string): ChangeScript | null {
  try {
    return ParseChangeScriptFilename(filePath);
  } catch (err) {
    if (err instanceof MigrationParseError) {
      return null;
    }
    throw err;
  }
}

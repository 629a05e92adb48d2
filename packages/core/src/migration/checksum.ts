/**
 * @module migration/checksum
 * Content normalization and checksums for change scripts.
 *
 * The checksum is recorded in the change history so a later `validate` can
 * tell whether an applied script was edited. It is a SHA-224 digest of the
 * normalized script body, rendered as lowercase hex.
 */

import * as crypto from 'crypto';

/** Hash algorithm used for CHECKSUM values. */
export const CHECKSUM_ALGORITHM = 'sha224';

/**
 * Normalizes a script body before hashing and execution:
 * trims surrounding whitespace, then drops one trailing `;` if present.
 * Only one terminator is removed, so `SELECT 1;;` becomes `SELECT 1;`.
 *
 * @param content - Raw file content
 */
export function NormalizeScriptContent(content: string): string {
  const trimmed = content.trim();
  return trimmed.endsWith(';') ? trimmed.slice(0, -1) : trimmed;
}

/**
 * Computes the checksum of already-normalized script content.
 *
 * @param content - Normalized content (see {@link NormalizeScriptContent})
 * @returns Lowercase hex SHA-224 digest of the UTF-8 bytes
 *
 * @example
 * ```typescript
 * const body = NormalizeScriptContent(fs.readFileSync('V1__init.sql', 'utf-8'));
 * const checksum = ComputeChecksum(body);
 * // checksum matches the CHANGE_HISTORY.CHECKSUM value for this script
 * ```
 */
export function ComputeChecksum(content: string): string {
  return crypto.createHash(CHECKSUM_ALGORITHM).update(content, 'utf-8').digest('hex');
}

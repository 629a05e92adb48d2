/**
 * @module migration/version
 * Natural ordering for change script versions.
 *
 * A version string is split on runs of digits. Digit runs compare as
 * numbers, everything between them compares as lower-cased text, so
 * `1.10` sorts after `1.9` and `2024_01a` after `2024_01`.
 */

/** One segment of a parsed version: a digit run or the text between runs. */
export type VersionSegment = bigint | string;

/**
 * Parsed, comparable form of a version string.
 *
 * Segments alternate text/number starting with text, and empty text
 * segments at either end are kept, so every key lines up position by
 * position with every other.
 *
 * @example `ParseVersionKey('1.2.2')` → `['', 1n, '.', 2n, '.', 2n, '']`
 */
export type VersionKey = readonly VersionSegment[];

/** Result of comparing two version keys. */
export type VersionOrdering = -1 | 0 | 1;

/**
 * Parses a version string into its comparable key. Accepts any string.
 */
export function ParseVersionKey(raw: string): VersionKey {
  return raw
    .split(/(\d+)/)
    .map((part) => (/^\d+$/.test(part) ? BigInt(part) : part.toLowerCase()));
}

/**
 * Compares two keys segment by segment.
 *
 * A key that runs out of segments first sorts lower. A number compared with
 * text (not produced by {@link ParseVersionKey}, but possible for hand-built
 * keys) compares both as text so the order stays total.
 */
export function CompareVersionKeys(a: VersionKey, b: VersionKey): VersionOrdering {
  const length = Math.min(a.length, b.length);

  for (let i = 0; i < length; i++) {
    const result = compareSegments(a[i], b[i]);
    if (result !== 0) {
      return result;
    }
  }

  return sign(a.length - b.length);
}

/**
 * Compares two raw version strings.
 */
export function CompareVersions(a: string, b: string): VersionOrdering {
  return CompareVersionKeys(ParseVersionKey(a), ParseVersionKey(b));
}

/**
 * Returns a new array sorted ascending by version. The sort is stable, so
 * sorting an already sorted array returns it unchanged.
 *
 * @param items - Items to sort (not mutated)
 * @param getVersion - Extracts the version string from an item
 */
export function SortByVersion<T>(items: readonly T[], getVersion: (item: T) => string): T[] {
  const keyed = items.map((item) => ({ item, key: ParseVersionKey(getVersion(item)) }));
  keyed.sort((x, y) => CompareVersionKeys(x.key, y.key));
  return keyed.map((entry) => entry.item);
}

/**
 * Returns the highest version in the list, or null for an empty list.
 */
export function MaxVersion(versions: readonly string[]): string | null {
  let highest: string | null = null;
  let highestKey: VersionKey = [];

  for (const version of versions) {
    const key = ParseVersionKey(version);
    if (highest === null || CompareVersionKeys(key, highestKey) > 0) {
      highest = version;
      highestKey = key;
    }
  }

  return highest;
}

function compareSegments(a: VersionSegment, b: VersionSegment): VersionOrdering {
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return compareText(a, b);
  }

  return compareText(a.toString(), b.toString());
}

// Code point order, not UTF-16 unit or locale order
function compareText(a: string, b: string): VersionOrdering {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i].codePointAt(0) ?? 0;
    const y = right[i].codePointAt(0) ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return sign(left.length - right.length);
}

function sign(n: number): VersionOrdering {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Plugin version tokens.
 *
 * Releases are stamped `YYYYMMDD_HHMMSS` (or `YYYYMMDDHHMMSS`); dotted
 * numeric versions such as `1.4.2` are accepted too. Separators `_`, `-`
 * and `.` are interchangeable.
 */

const TIMESTAMP_PATTERN = /^(\d{8})[._-]?(\d{6})$/;
const NUMERIC_PATTERN = /^\d+(?:[._-]\d+)*$/;

/**
 * Numeric segments of a version token, or null when the token is not
 * well-formed.
 */
export function parseVersion(token: string): number[] | null {
  const trimmed = token.trim().replace(/^v/i, "");

  const timestamp = TIMESTAMP_PATTERN.exec(trimmed);
  if (timestamp) {
    return [Number(`${timestamp[1]}${timestamp[2]}`)];
  }

  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }
  const segments = trimmed.split(/[._-]/).map(Number);
  return segments.every(Number.isSafeInteger) ? segments : null;
}

/**
 * Orders two version tokens: positive when `a` is newer, negative when `b` is.
 *
 * - both well-formed: numeric, segment by segment (missing segments are 0)
 * - only one well-formed: that one is newer
 * - neither: plain string order
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);

  if (left && right) {
    const length = Math.max(left.length, right.length);
    for (let i = 0; i < length; i++) {
      const difference = (left[i] ?? 0) - (right[i] ?? 0);
      if (difference !== 0) {
        return difference > 0 ? 1 : -1;
      }
    }
    return 0;
  }
  if (left) return 1;
  if (right) return -1;

  if (a === b) return 0;
  return a > b ? 1 : -1;
}

export function isNewerVersion(candidate: string, current: string): boolean {
  return compareVersions(candidate, current) > 0;
}

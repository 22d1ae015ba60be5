/**
 * @file packages/cli/src/domain/logic/path-comparator.ts
 * @description Natural ordering of sensor paths (`temp2` before `temp10`).
 */

const isDigit = (code: number): boolean => code >= 0x30 && code <= 0x39;

/**
 * Length of the digit run starting at `from`.
 */
function digitRunEnd(s: string, from: number): number {
  let end = from;
  while (end < s.length && isDigit(s.charCodeAt(end))) end++;
  return end;
}

/**
 * Compares two decimal digit strings by numeric value. Any length is accepted.
 */
function compareDigitRuns(a: string, b: string): number {
  const x = a.replace(/^0+/, '');
  const y = b.replace(/^0+/, '');
  if (x.length !== y.length) return x.length - y.length;
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Natural order over path strings.
 *
 * Digit runs compare by value, so `"fan007"` and `"fan7"` are equal. Where
 * only one side has a digit, the digit side sorts first. Everything else
 * compares by code point, and a string that runs out first sorts first.
 *
 * @returns negative, zero or positive, like `Array.prototype.sort` expects
 */
export function comparePaths(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    if (i >= a.length) return -1;
    if (j >= b.length) return 1;

    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    const da = isDigit(ca);
    const db = isDigit(cb);

    if (da && db) {
      const endA = digitRunEnd(a, i);
      const endB = digitRunEnd(b, j);
      const order = compareDigitRuns(a.slice(i, endA), b.slice(j, endB));
      if (order !== 0) return order;
      i = endA;
      j = endB;
      continue;
    }

    if (da !== db) return da ? -1 : 1;
    if (ca !== cb) return ca < cb ? -1 : 1;

    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }

  return 0;
}

/** Strict "less than" predicate over {@link comparePaths}. */
export const pathLess = (a: string, b: string): boolean => comparePaths(a, b) < 0;

const byCodeUnit = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Returns a sorted copy. Paths that are naturally equal (`fan007`, `fan7`)
 * fall back to code-unit order so the result does not depend on input order.
 */
export function sortPaths(paths: Iterable<string>): string[] {
  return [...paths].sort((a, b) => comparePaths(a, b) || byCodeUnit(a, b));
}

/**
 * Entries of a path-keyed map, sorted by key with {@link sortPaths} ordering.
 */
export function sortedEntries<V>(map: ReadonlyMap<string, V>): Array<[string, V]> {
  return [...map.entries()].sort(([a], [b]) => comparePaths(a, b) || byCodeUnit(a, b));
}

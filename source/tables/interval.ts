/** Inclusive code point range. */
export type Interval = readonly [start: number, end: number];

/** Sorted, non-overlapping intervals sharing one width class. */
export type IntervalTable = readonly Interval[];

export type WidthCategory = "zeroWidth" | "wideEastAsian";

export const WIDTH_CATEGORIES: readonly WidthCategory[] = [
  "zeroWidth",
  "wideEastAsian",
];

/**
 * Whether a code point falls inside one of the table's intervals.
 * Units: Unicode scalar values.
 */
export function bisearch(codePoint: number, table: IntervalTable): boolean {
  const first = table[0];
  const last = table[table.length - 1];
  if (first === undefined || last === undefined) {
    return false;
  }
  if (codePoint < first[0] || codePoint > last[1]) {
    return false;
  }

  let lo = 0;
  let hi = table.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const interval = table[mid];
    if (interval === undefined) {
      return false;
    }
    if (codePoint > interval[1]) {
      lo = mid + 1;
    } else if (codePoint < interval[0]) {
      hi = mid - 1;
    } else {
      return true;
    }
  }
  return false;
}

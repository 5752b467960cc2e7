/**
 * Half-open row ranges over the terminal's logical row space.
 */

export interface RowRange {
  readonly start: number;
  readonly end: number;
}

export function rowRange(start: number, end: number): RowRange {
  return { start, end };
}

/**
 * Two ranges overlap iff `a.start < b.end && a.end > b.start`.
 * Partial overlaps count.
 */
export function rangesOverlap(a: RowRange, b: RowRange): boolean {
  return a.start < b.end && a.end > b.start;
}

/**
 * Check whether `outer` fully contains `inner`.
 */
export function rangeContains(outer: RowRange, inner: RowRange): boolean {
  return outer.start <= inner.start && outer.end >= inner.end;
}

export function rangesEqual(a: RowRange, b: RowRange): boolean {
  return a.start === b.start && a.end === b.end;
}

export function formatRange(range: RowRange): string {
  return `${range.start}..${range.end}`;
}

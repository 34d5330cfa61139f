export interface TimeInterval {
  start: Date;
  end: Date;
}

/** Half-open `[start, end)` intersection: intervals that only touch do not overlap. */
export function overlaps(a: TimeInterval, b: TimeInterval): boolean {
  return a.start < b.end && a.end > b.start;
}

/**
 * Expands a start value with an optional "next" value and an optional
 * inclusive "end" into an explicit sequence.
 *
 *   expandRange(1)        -> [1]
 *   expandRange(1, 4)     -> [1, 4]
 *   expandRange(1, _, 3)  -> [1, 2, 3]
 *   expandRange(1, 4, 2)  -> [1, 2, 4]
 *
 * The next value is appended after the run as-is, even when it repeats a
 * value already in the run. An end below the start is ignored.
 */
export function expandRange(start: number, next?: number, end?: number): number[] {
  const values: number[] = [start];

  if (end !== undefined) {
    for (let value = start + 1; value <= end; value += 1) {
      values.push(value);
    }
  }

  if (next !== undefined) {
    values.push(next);
  }

  return values;
}

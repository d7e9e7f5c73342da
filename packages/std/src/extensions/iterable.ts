/**
 * Iterable Extension Methods
 *
 * Sequence helpers that accept any `Iterable`, including unbounded ones where
 * the operation allows it:
 *
 * - `adjacentPairs` (Kotlin zipWithNext, Rust `windows(2)`, optionally wrapping)
 * - `partitioned` (Scala/Haskell/Kotlin partition)
 * - `partitionedUpTo` (Scala/Haskell splitAt, with a bounds check)
 */

export interface AdjacentPairsOptions {
  /** Also pair the last element with the first. Defaults to `false`. */
  wrapping?: boolean;
}

function* adjacentPairsIterator<A>(source: Iterable<A>, wrapping: boolean): IterableIterator<[A, A]> {
  const iterator = source[Symbol.iterator]();
  const head = iterator.next();
  if (head.done) return;

  const first = head.value;
  let previous = first;
  for (let step = iterator.next(); !step.done; step = iterator.next()) {
    yield [previous, step.value];
    previous = step.value;
  }
  if (wrapping) yield [previous, first];
}

/**
 * Lazily pairs each element with its successor: `[a, b, c]` gives `[a, b]`,
 * `[b, c]`, and with `wrapping` also `[c, a]`. A single element only pairs
 * with itself when wrapping.
 *
 * The result can be iterated again whenever `source` can.
 *
 * @example
 * ```typescript
 * [...adjacentPairs([1, 2, 3])];                     // [[1, 2], [2, 3]]
 * [...adjacentPairs([1, 2, 3], { wrapping: true })]; // [[1, 2], [2, 3], [3, 1]]
 * ```
 */
export function adjacentPairs<A>(
  source: Iterable<A>,
  options: AdjacentPairsOptions = {},
): Iterable<[A, A]> {
  const wrapping = options.wrapping ?? false;
  return {
    [Symbol.iterator]: () => adjacentPairsIterator(source, wrapping),
  };
}

/**
 * Splits `source` into the elements that satisfy `pred` and those that
 * don't, keeping relative order in both.
 *
 * @returns `[matching, nonMatching]`
 */
export function partitioned<A>(source: Iterable<A>, pred: (a: A) => boolean): [A[], A[]] {
  const matching: A[] = [];
  const nonMatching: A[] = [];
  for (const x of source) (pred(x) ? matching : nonMatching).push(x);
  return [matching, nonMatching];
}

/**
 * Splits `source` at `index`: the elements before it, and the rest.
 *
 * @throws RangeError unless `0 <= index <= length`
 */
export function partitionedUpTo<A>(source: Iterable<A>, index: number): [A[], A[]] {
  const items = [...source];
  if (!Number.isInteger(index) || index < 0 || index > items.length) {
    throw new RangeError(`partition index ${index} is outside 0...${items.length}`);
  }
  return [items.slice(0, index), items.slice(index)];
}

// ============================================================================
// Aggregate
// ============================================================================

export const IterableExt = {
  adjacentPairs,
  partitioned,
  partitionedUpTo,
} as const;

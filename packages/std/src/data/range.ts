/**
 * Range Type
 *
 * Numeric ranges with a step, half-open (`range`) or closed (`rangeInclusive`).
 * Either end may be infinite: `rangeFrom(2)` is every integer from 2 up,
 * `rangeThrough(5)` every integer up to and including 5. Ranges with an
 * infinite start can be queried but not iterated.
 */

import type { Eq } from "../typeclasses/index.js";

export interface Range {
  readonly start: number;
  readonly end: number;
  readonly step: number;
  readonly inclusive: boolean;
}

export function range(start: number, end: number, step: number = 1): Range {
  return { start, end, step, inclusive: false };
}

export function rangeInclusive(start: number, end: number, step: number = 1): Range {
  return { start, end, step, inclusive: true };
}

/** `start, start + 1, …` without an upper bound. */
export function rangeFrom(start: number): Range {
  return { start, end: Infinity, step: 1, inclusive: false };
}

/** Every integer below `end`. */
export function rangeUpTo(end: number): Range {
  return { start: -Infinity, end, step: 1, inclusive: false };
}

/** Every integer up to and including `end`. */
export function rangeThrough(end: number): Range {
  return { start: -Infinity, end, step: 1, inclusive: true };
}

/**
 * @throws RangeError for a step other than 1 on a range without a finite start
 */
export function rangeBy(r: Range, step: number): Range {
  checkUnanchoredStep(r.start, step);
  return { ...r, step };
}

/** Values of a range without a start are only defined for unit steps. */
function checkUnanchoredStep(start: number, step: number): void {
  if (!Number.isFinite(start) && step !== 1) {
    throw new RangeError(`a range starting at ${start} cannot have step ${step}`);
  }
}

// ============================================================================
// Iteration
// ============================================================================

export function* rangeIterator(r: Range): IterableIterator<number> {
  const { start, end, step, inclusive } = r;
  if (!Number.isFinite(start)) {
    throw new RangeError(`cannot iterate a range starting at ${start}`);
  }
  if (step > 0) {
    for (let i = start; inclusive ? i <= end : i < end; i += step) yield i;
  } else if (step < 0) {
    for (let i = start; inclusive ? i >= end : i > end; i += step) yield i;
  }
}

export function rangeToArray(r: Range): number[] {
  return [...rangeIterator(r)];
}

// ============================================================================
// Queries
// ============================================================================

export function rangeIsEmpty(r: Range): boolean {
  const { start, end, step, inclusive } = r;
  if (step > 0) return inclusive ? start > end : start >= end;
  if (step < 0) return inclusive ? start < end : start <= end;
  return true;
}

/**
 * @throws RangeError for a step other than 1 on a range without a finite start
 */
export function rangeContains(r: Range, value: number): boolean {
  const { start, end, step, inclusive } = r;
  checkUnanchoredStep(start, step);
  if (step > 0) {
    if (inclusive ? value > end : value >= end) return false;
    if (value < start) return false;
  } else if (step < 0) {
    if (inclusive ? value < end : value <= end) return false;
    if (value > start) return false;
  } else {
    return false;
  }
  // Without a finite start the step is 1 and values are integers.
  if (!Number.isFinite(start)) return Number.isInteger(value);
  return (value - start) % step === 0;
}

export function rangeSize(r: Range): number {
  if (rangeIsEmpty(r)) return 0;
  const { start, end, step, inclusive } = r;
  const steps = (end - start) / step;
  if (!Number.isFinite(steps)) return Infinity;
  return inclusive ? Math.floor(steps) + 1 : Math.ceil(steps);
}

export function rangeFirst(r: Range): number | undefined {
  if (rangeIsEmpty(r) || !Number.isFinite(r.start)) return undefined;
  return r.start;
}

export function rangeLast(r: Range): number | undefined {
  const size = rangeSize(r);
  if (size === 0 || !Number.isFinite(size)) return undefined;
  return r.start + (size - 1) * r.step;
}

/**
 * Half-open integer bounds `[lower, upper)` of an ascending unit-step range.
 * Either bound may be infinite. Returns `undefined` for any other range
 * (other steps, or a fractional start).
 */
export function rangeBounds(r: Range): { lower: number; upper: number } | undefined {
  if (r.step !== 1) return undefined;
  if (Number.isFinite(r.start) && !Number.isInteger(r.start)) return undefined;
  const upper = r.inclusive ? Math.floor(r.end) + 1 : Math.ceil(r.end);
  return { lower: r.start, upper: Math.max(upper, r.start) };
}

/**
 * Whether every value of `inner` lies in `outer`. An empty `inner` is never
 * contained.
 *
 * @throws RangeError if `inner` is infinite and not a unit-step range
 */
export function rangeContainsRange(outer: Range, inner: Range): boolean {
  if (rangeIsEmpty(inner)) return false;

  const outerBounds = rangeBounds(outer);
  const innerBounds = rangeBounds(inner);
  if (outerBounds && innerBounds) {
    return outerBounds.lower <= innerBounds.lower && innerBounds.upper <= outerBounds.upper;
  }

  if (!Number.isFinite(rangeSize(inner))) {
    throw new RangeError("cannot compare an unbounded stepped range element by element");
  }
  for (const value of rangeIterator(inner)) {
    if (!rangeContains(outer, value)) return false;
  }
  return true;
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Range.
 * Two ranges are equal if they have the same start, end, step, and inclusive flag.
 */
export const eqRange: Eq<Range> = {
  equals: (a, b) =>
    a.start === b.start && a.end === b.end && a.step === b.step && a.inclusive === b.inclusive,
  notEquals: (a, b) =>
    a.start !== b.start || a.end !== b.end || a.step !== b.step || a.inclusive !== b.inclusive,
};

// ============================================================================
// Aggregate
// ============================================================================

export const RangeExt = {
  range,
  inclusive: rangeInclusive,
  from: rangeFrom,
  upTo: rangeUpTo,
  through: rangeThrough,
  by: rangeBy,
  iterator: rangeIterator,
  toArray: rangeToArray,
  contains: rangeContains,
  containsRange: rangeContainsRange,
  bounds: rangeBounds,
  size: rangeSize,
  first: rangeFirst,
  last: rangeLast,
  isEmpty: rangeIsEmpty,
} as const;

/**
 * @arithmos/std — Standard Library
 *
 * ## Typeclasses
 *
 * Eq, Ord, Hash, Semigroup, Monoid, Group and IntegerRing, with instances for
 * `number`, `bigint` and 32-bit integers.
 *
 * ## Data Types
 *
 * - Range (half-open, closed and unbounded numeric ranges)
 *
 * ## Extension Methods
 *
 * - IterableExt (adjacentPairs, partitioned, partitionedUpTo)
 *
 * @example
 * ```ts
 * import { adjacentPairs, rangeContainsRange, range, combineAll, monoidNumber } from "@arithmos/std";
 *
 * [...adjacentPairs([1, 2, 3], { wrapping: true })]; // [[1, 2], [2, 3], [3, 1]]
 * rangeContainsRange(range(0, 20), range(2, 8));      // true
 * combineAll([1, 2, 3], monoidNumber);                // 6
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";

// Errors
export { OverflowError } from "./errors.js";

// Data types
export * from "./data/range.js";

// Extension methods
export * from "./extensions/iterable.js";

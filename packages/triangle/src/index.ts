/**
 * @arithmos/triangle — Arithmetic Triangles
 *
 * A generalized Pascal's triangle over any commutative Monoid, with memoized
 * values, O(1) integer row sums, planned column-range sums and an unbounded
 * row-major traversal.
 *
 * @example
 * ```ts
 * import { ArithmeticTriangle } from "@arithmos/triangle";
 * import { rangeInclusive } from "@arithmos/std";
 *
 * const pascal = ArithmeticTriangle.integers();
 * pascal.value(7, 5);                            // 21
 * pascal.sumOfColumns(rangeInclusive(1, 3), 4);  // 14
 * ```
 */

export { ArithmeticTriangle } from "./triangle.js";
export type { ArithmeticTriangleOptions } from "./triangle.js";

export { TriangleIndex, eqTriangleIndex, ordTriangleIndex, hashTriangleIndex } from "./triangle-index.js";

export { TriangleCache, isCacheable } from "./cache.js";

export { valueAt } from "./value.js";
export type { TriangleContext } from "./value.js";

export { rowSum, genericRowSum } from "./row-sum.js";

export { planColumnSum, columnSum, describePlan } from "./range-sum.js";
export type { ColumnSumPlan, ColumnSumStrategy } from "./range-sum.js";

export {
  bounded,
  startPosition,
  endPosition,
  comparePositions,
  positionsEqual,
  positionAfter,
  positionBefore,
  positionOffsetBy,
  distanceBetween,
} from "./traversal.js";
export type { TrianglePosition } from "./traversal.js";

export { InvalidIndexError, UnboundedPositionError } from "./errors.js";

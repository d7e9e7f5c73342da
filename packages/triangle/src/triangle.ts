/**
 * ArithmeticTriangle<A> — a generalized Pascal's triangle, evaluated on demand.
 *
 * Every edge holds `base` and every interior value is the sum of the two
 * above it. The element type only needs a Monoid; a Group unlocks the
 * complement strategy for column sums, and an IntegerRing the O(1) row sum.
 *
 * @example
 * ```typescript
 * const pascal = ArithmeticTriangle.integers();
 * pascal.value(6, 3);                           // 20
 * pascal.sumOfRow(5);                           // 32
 * pascal.sumOfColumns(rangeInclusive(2, 3), 6); // 35
 *
 * const threes = new ArithmeticTriangle(monoidBigInt, 3n);
 * threes.value(4, 2);                           // 18n
 * ```
 */

import { createTracer, type Tracer } from "@arithmos/core";
import { integerNumber, isGroup, type IntegerRing, type Monoid, type Range } from "@arithmos/std";
import { TriangleCache } from "./cache.js";
import { InvalidIndexError, UnboundedPositionError } from "./errors.js";
import { columnSum, planColumnSum, type ColumnSumPlan } from "./range-sum.js";
import { rowSum } from "./row-sum.js";
import type { TrianglePosition } from "./traversal.js";
import { TriangleIndex } from "./triangle-index.js";
import { valueAt, type TriangleContext } from "./value.js";

export interface ArithmeticTriangleOptions {
  /** Receives `cache-fill` and `range-sum` events. Defaults to a "triangle" tracer. */
  tracer?: Tracer;
}

function checkRow(row: number, column: number = 0): void {
  if (!Number.isInteger(row) || row < 0) {
    throw new InvalidIndexError(row, column, `A row must have a non-negative integer index, got ${row}`);
  }
}

export class ArithmeticTriangle<A> implements Iterable<A> {
  private readonly context: TriangleContext<A>;

  constructor(
    readonly arithmetic: Monoid<A>,
    readonly base: A,
    options: ArithmeticTriangleOptions = {},
  ) {
    this.context = {
      arithmetic,
      base,
      cache: new TriangleCache<A>(),
      tracer: options.tracer ?? createTracer("triangle"),
    };
  }

  /** A triangle over `ring` whose edges hold `ring.one()`. */
  static fromRing<A>(ring: IntegerRing<A>, options?: ArithmeticTriangleOptions): ArithmeticTriangle<A> {
    return new ArithmeticTriangle(ring, ring.one(), options);
  }

  /** Pascal's triangle over safe-integer numbers. */
  static integers(options?: ArithmeticTriangleOptions): ArithmeticTriangle<number> {
    return ArithmeticTriangle.fromRing(integerNumber, options);
  }

  /** `row + 1` for a row of the triangle, 0 for a negative row. */
  static numberOfColumns(row: number): number {
    return row < 0 ? 0 : row + 1;
  }

  get tracer(): Tracer {
    return this.context.tracer;
  }

  /** Number of memoized interior entries. */
  get cacheSize(): number {
    return this.context.cache.size;
  }

  /**
   * The value at `(row, column)`. A column outside the row is zero.
   *
   * @throws InvalidIndexError for a negative or fractional row or column
   */
  value(row: number, column: number): A {
    checkRow(row, column);
    if (!Number.isInteger(column)) {
      throw new InvalidIndexError(row, column, `A column must be an integer, got ${column}`);
    }
    return valueAt(this.context, row, column);
  }

  at(index: TriangleIndex): A {
    return valueAt(this.context, index.row, index.column);
  }

  /**
   * @throws UnboundedPositionError for the end position
   */
  element(position: TrianglePosition): A {
    if (position.kind === "unbounded") throw new UnboundedPositionError("read");
    return this.at(position.index);
  }

  /**
   * Sum of every value in `row`; zero for a negative row.
   *
   * @throws InvalidIndexError for a fractional row
   */
  sumOfRow(row: number): A {
    if (!Number.isInteger(row)) {
      throw new InvalidIndexError(row, 0, `A row must have an integer index, got ${row}`);
    }
    return rowSum(this.context, row);
  }

  /**
   * Sum of the values at `columns` in `row`. Columns outside the row are left
   * out.
   */
  sumOfColumns(columns: Range, row: number): A {
    if (!Number.isInteger(row)) {
      throw new InvalidIndexError(row, 0, `A row must have an integer index, got ${row}`);
    }
    return columnSum(this.context, columns, row);
  }

  /** The strategy `sumOfColumns` would use. */
  planColumnSum(columns: Range, row: number): ColumnSumPlan {
    return planColumnSum(columns, row, isGroup(this.arithmetic));
  }

  /** Every index in row-major order, without end. */
  *indices(): IterableIterator<TriangleIndex> {
    for (let index = new TriangleIndex(0, 0); ; index = index.next()) yield index;
  }

  /** Every value in row-major order, without end. */
  *elements(): IterableIterator<A> {
    for (const index of this.indices()) yield this.at(index);
  }

  [Symbol.iterator](): IterableIterator<A> {
    return this.elements();
  }
}

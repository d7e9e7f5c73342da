/**
 * TriangleIndex — a (row, column) coordinate in an arithmetic triangle.
 *
 * Indices are ordered row-major: by row, then by column. Every index also has
 * an ordinal, its zero-based position in that order, which makes offsets and
 * distances O(1):
 *
 *   row 0:  0
 *   row 1:  1  2
 *   row 2:  3  4  5
 *   row 3:  6  7  8  9
 */

import {
  EQ_ORD,
  GT,
  LT,
  combineHashes,
  hashNumber,
  makeEq,
  makeOrd,
  type Eq,
  type Hash,
  type Ord,
  type Ordering,
} from "@arithmos/std";
import { InvalidIndexError } from "./errors.js";

/** Number of positions in rows `0..<row`. */
function triangular(row: number): number {
  return (row * (row + 1)) / 2;
}

export class TriangleIndex {
  /**
   * @throws InvalidIndexError unless `row` and `column` are integers with
   * `0 <= column <= row`
   */
  constructor(
    readonly row: number,
    readonly column: number,
  ) {
    if (!Number.isInteger(row) || row < 0) {
      throw new InvalidIndexError(row, column, `A row must have a non-negative integer index, got ${row}`);
    }
    if (!Number.isInteger(column) || column < 0 || column > row) {
      throw new InvalidIndexError(row, column, `Column ${column} does not exist in row ${row}`);
    }
  }

  /**
   * The index at a row-major position.
   *
   * @throws InvalidIndexError for a negative or fractional ordinal
   */
  static fromOrdinal(ordinal: number): TriangleIndex {
    if (!Number.isSafeInteger(ordinal) || ordinal < 0) {
      throw new InvalidIndexError(NaN, NaN, `${ordinal} is not a position in the triangle`);
    }
    let row = Math.floor((Math.sqrt(8 * ordinal + 1) - 1) / 2);
    // The square root can be off by one for large ordinals.
    while (triangular(row) > ordinal) row--;
    while (triangular(row + 1) <= ordinal) row++;
    return new TriangleIndex(row, ordinal - triangular(row));
  }

  /** Zero-based position in row-major order. */
  get ordinal(): number {
    return triangular(this.row) + this.column;
  }

  /**
   * The next index in row-major order: the next column, or the start of the
   * next row after the last column.
   */
  next(): TriangleIndex {
    return this.column < this.row
      ? new TriangleIndex(this.row, this.column + 1)
      : new TriangleIndex(this.row + 1, 0);
  }

  /**
   * The previous index in row-major order, or `undefined` before `(0, 0)`.
   */
  previous(): TriangleIndex | undefined {
    if (this.column > 0) return new TriangleIndex(this.row, this.column - 1);
    if (this.row === 0) return undefined;
    return new TriangleIndex(this.row - 1, this.row - 1);
  }

  /**
   * Whether the column is the first or last in its row. Those columns always
   * hold the triangle's base.
   */
  isColumnFirstOrLast(): boolean {
    return this.column === 0 || this.column === this.row;
  }

  /**
   * The two positions whose values add up to this one: directly above and
   * above-left. Either is `undefined` where it falls outside the triangle.
   */
  parents(): [above: TriangleIndex | undefined, aboveLeft: TriangleIndex | undefined] {
    const row = this.row - 1;
    if (row < 0) return [undefined, undefined];
    return [
      this.column <= row ? new TriangleIndex(row, this.column) : undefined,
      this.column >= 1 ? new TriangleIndex(row, this.column - 1) : undefined,
    ];
  }

  compare(other: TriangleIndex): Ordering {
    if (this.row !== other.row) return this.row < other.row ? LT : GT;
    if (this.column !== other.column) return this.column < other.column ? LT : GT;
    return EQ_ORD;
  }

  equals(other: TriangleIndex): boolean {
    return this.row === other.row && this.column === other.column;
  }

  toString(): string {
    return `(${this.row}, ${this.column})`;
  }
}

// ============================================================================
// Typeclass Instances
// ============================================================================

export const eqTriangleIndex: Eq<TriangleIndex> = makeEq<TriangleIndex>((a, b) => a.equals(b));

/**
 * Row-major order.
 */
export const ordTriangleIndex: Ord<TriangleIndex> = makeOrd<TriangleIndex>((a, b) => a.compare(b));

export const hashTriangleIndex: Hash<TriangleIndex> = {
  hash: (i) => combineHashes(hashNumber.hash(i.row), hashNumber.hash(i.column)),
};

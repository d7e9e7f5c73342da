/**
 * Triangle Error Types
 */

/**
 * Thrown when a coordinate is not a position in the triangle: a negative or
 * fractional row, or a column outside `0...row`. This is a precondition
 * violation, not a recoverable condition.
 */
export class InvalidIndexError extends RangeError {
  constructor(
    readonly row: number,
    readonly column: number,
    message: string = `(${row}, ${column}) is not a position in the triangle`,
  ) {
    super(message);
    this.name = "InvalidIndexError";
  }
}

/**
 * Thrown when an operation reads, advances past, or steps back from the
 * unbounded end position.
 */
export class UnboundedPositionError extends Error {
  constructor(readonly operation: string) {
    super(`Cannot ${operation} the unbounded end position`);
    this.name = "UnboundedPositionError";
  }
}

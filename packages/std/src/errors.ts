/**
 * Thrown when an integer operation's result does not fit the element type.
 */
export class OverflowError extends RangeError {
  constructor(
    readonly operation: string,
    readonly elementType: string,
  ) {
    super(`Arithmetic overflow: ${operation} does not fit in ${elementType}`);
    this.name = "OverflowError";
  }
}

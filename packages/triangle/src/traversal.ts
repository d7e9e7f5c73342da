/**
 * Positions in the row-major enumeration of a triangle.
 *
 * The enumeration never ends, so its end position is a sentinel that every
 * bounded position compares below. Moves and distances go through
 * `TriangleIndex.ordinal` and take O(1).
 */

import { EQ_ORD, GT, LT, type Ordering } from "@arithmos/std";
import { InvalidIndexError, UnboundedPositionError } from "./errors.js";
import { TriangleIndex } from "./triangle-index.js";

export type TrianglePosition =
  | { readonly kind: "bounded"; readonly index: TriangleIndex }
  | { readonly kind: "unbounded" };

export function bounded(index: TriangleIndex): TrianglePosition {
  return { kind: "bounded", index };
}

/** `(0, 0)`. */
export const startPosition: TrianglePosition = bounded(new TriangleIndex(0, 0));

/** Past every index; never reached by advancing. */
export const endPosition: TrianglePosition = { kind: "unbounded" };

export function comparePositions(a: TrianglePosition, b: TrianglePosition): Ordering {
  if (a.kind === "unbounded") return b.kind === "unbounded" ? EQ_ORD : GT;
  if (b.kind === "unbounded") return LT;
  return a.index.compare(b.index);
}

export function positionsEqual(a: TrianglePosition, b: TrianglePosition): boolean {
  return comparePositions(a, b) === EQ_ORD;
}

/**
 * @throws UnboundedPositionError for the end position
 */
export function positionAfter(position: TrianglePosition): TrianglePosition {
  if (position.kind === "unbounded") throw new UnboundedPositionError("advance past");
  return bounded(position.index.next());
}

/**
 * @throws UnboundedPositionError for the end position
 * @throws InvalidIndexError for the start position
 */
export function positionBefore(position: TrianglePosition): TrianglePosition {
  if (position.kind === "unbounded") throw new UnboundedPositionError("step back from");
  const previous = position.index.previous();
  if (previous === undefined) {
    throw new InvalidIndexError(0, -1, "There is no position before (0, 0)");
  }
  return bounded(previous);
}

/**
 * Moves `distance` positions forward (or back, when negative).
 *
 * With a `limit`, returns `undefined` instead of moving beyond it in the
 * direction of travel; a limit behind the move has no effect.
 *
 * @throws UnboundedPositionError when moving the end position
 * @throws InvalidIndexError when moving back past the start without a limit
 */
export function positionOffsetBy(position: TrianglePosition, distance: number): TrianglePosition;
export function positionOffsetBy(
  position: TrianglePosition,
  distance: number,
  limit: TrianglePosition,
): TrianglePosition | undefined;
export function positionOffsetBy(
  position: TrianglePosition,
  distance: number,
  limit?: TrianglePosition,
): TrianglePosition | undefined {
  if (!Number.isInteger(distance)) {
    throw new RangeError(`an offset must be an integer, got ${distance}`);
  }
  if (position.kind === "unbounded") {
    if (distance === 0) return position;
    throw new UnboundedPositionError("offset");
  }

  if (limit !== undefined) {
    const room = distanceBetween(position, limit);
    if (distance > 0 && room >= 0 && distance > room) return undefined;
    if (distance < 0 && room <= 0 && distance < room) return undefined;
  }

  const ordinal = position.index.ordinal + distance;
  if (ordinal < 0) {
    throw new InvalidIndexError(NaN, NaN, `Offset ${distance} from ${position.index} is before (0, 0)`);
  }
  return bounded(TriangleIndex.fromOrdinal(ordinal));
}

/**
 * Number of moves from `from` to `to`; negative when `to` comes first, and
 * infinite when exactly one of them is the end position.
 */
export function distanceBetween(from: TrianglePosition, to: TrianglePosition): number {
  if (from.kind === "unbounded") return to.kind === "unbounded" ? 0 : -Infinity;
  if (to.kind === "unbounded") return Infinity;
  return to.index.ordinal - from.index.ordinal;
}

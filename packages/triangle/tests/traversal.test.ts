import { describe, it, expect } from "vitest";
import { adjacentPairs } from "@arithmos/std";
import {
  ArithmeticTriangle,
  InvalidIndexError,
  TriangleIndex,
  UnboundedPositionError,
  bounded,
  comparePositions,
  distanceBetween,
  endPosition,
  positionAfter,
  positionBefore,
  positionOffsetBy,
  positionsEqual,
  startPosition,
  type TrianglePosition,
} from "../src/index.js";

function at(row: number, column: number): TrianglePosition {
  return bounded(new TriangleIndex(row, column));
}

function show(position: TrianglePosition | undefined): string {
  if (position === undefined) return "none";
  return position.kind === "unbounded" ? "end" : position.index.toString();
}

function take<A>(source: Iterable<A>, count: number): A[] {
  const taken: A[] = [];
  for (const x of source) {
    if (taken.length === count) break;
    taken.push(x);
  }
  return taken;
}

describe("positions", () => {
  it("start at (0, 0) and end at the sentinel", () => {
    expect(show(startPosition)).toBe("(0, 0)");
    expect(show(endPosition)).toBe("end");
  });

  it("order bounded positions row-major, below the end", () => {
    expect(comparePositions(at(2, 1), at(3, 0))).toBe(-1);
    expect(comparePositions(at(3, 0), at(2, 1))).toBe(1);
    expect(comparePositions(at(1000, 1000), endPosition)).toBe(-1);
    expect(comparePositions(endPosition, at(1000, 1000))).toBe(1);
    expect(comparePositions(endPosition, endPosition)).toBe(0);
    expect(positionsEqual(at(4, 2), at(4, 2))).toBe(true);
    expect(positionsEqual(at(4, 2), endPosition)).toBe(false);
  });

  it("advance and step back", () => {
    expect(show(positionAfter(at(2, 2)))).toBe("(3, 0)");
    expect(show(positionBefore(at(3, 0)))).toBe("(2, 2)");
  });

  it("cannot move the end position", () => {
    expect(() => positionAfter(endPosition)).toThrow(UnboundedPositionError);
    expect(() => positionAfter(endPosition)).toThrow("Cannot advance past the unbounded end position");
    expect(() => positionBefore(endPosition)).toThrow("Cannot step back from the unbounded end position");
    expect(() => positionOffsetBy(endPosition, 1)).toThrow("Cannot offset the unbounded end position");
    expect(show(positionOffsetBy(endPosition, 0))).toBe("end");
  });

  it("cannot step back from the start", () => {
    expect(() => positionBefore(startPosition)).toThrow(InvalidIndexError);
    expect(() => positionOffsetBy(at(1, 0), -2)).toThrow(InvalidIndexError);
  });

  it("offset by any distance in one step", () => {
    expect(show(positionOffsetBy(startPosition, 10))).toBe("(4, 0)");
    expect(show(positionOffsetBy(at(4, 0), -1))).toBe("(3, 3)");
    expect(show(positionOffsetBy(at(2, 1), 0))).toBe("(2, 1)");
    expect(show(positionOffsetBy(startPosition, 5000050500))).toBe("(100000, 500)");
    expect(() => positionOffsetBy(startPosition, 1.5)).toThrow(RangeError);
  });

  it("stop at a limit in the direction of travel", () => {
    expect(show(positionOffsetBy(startPosition, 5, at(2, 2)))).toBe("(2, 2)");
    expect(show(positionOffsetBy(startPosition, 6, at(2, 2)))).toBe("none");
    expect(show(positionOffsetBy(at(3, 0), -5, at(1, 1)))).toBe("none");
    expect(show(positionOffsetBy(at(3, 0), -4, startPosition))).toBe("(1, 1)");
  });

  it("ignore a limit behind the move", () => {
    expect(show(positionOffsetBy(at(3, 0), 2, at(1, 0)))).toBe("(3, 2)");
    expect(show(positionOffsetBy(at(3, 0), -2, at(5, 0)))).toBe("(2, 1)");
    expect(show(positionOffsetBy(at(3, 0), 1000, endPosition))).toBe("(44, 16)");
  });

  it("measure distances", () => {
    expect(distanceBetween(startPosition, at(4, 0))).toBe(10);
    expect(distanceBetween(at(4, 0), startPosition)).toBe(-10);
    expect(distanceBetween(at(3, 1), at(3, 1))).toBe(0);
    expect(distanceBetween(at(3, 1), endPosition)).toBe(Infinity);
    expect(distanceBetween(endPosition, at(3, 1))).toBe(-Infinity);
    expect(distanceBetween(endPosition, endPosition)).toBe(0);
  });
});

describe("enumeration", () => {
  it("yields values row by row", () => {
    const t = ArithmeticTriangle.integers();
    expect(take(t, 6)).toEqual([1, 1, 1, 1, 2, 1]);
    expect(take(t, 15)).toEqual([1, 1, 1, 1, 2, 1, 1, 3, 3, 1, 1, 4, 6, 4, 1]);
  });

  it("starts over on every iteration", () => {
    const t = ArithmeticTriangle.integers();
    const first = t.indices();
    for (let i = 0; i < 4; i++) first.next();
    expect(String(first.next().value)).toBe("(2, 1)");
    expect(String(t.indices().next().value)).toBe("(0, 0)");
    expect(take(t, 6)).toEqual(take(t, 6));
  });

  it("yields indices in the same order", () => {
    const t = ArithmeticTriangle.integers();
    expect(take(t.indices(), 5).map(String)).toEqual(["(0, 0)", "(1, 0)", "(1, 1)", "(2, 0)", "(2, 1)"]);
  });

  it("consecutive indices are one position apart", () => {
    const t = ArithmeticTriangle.integers();
    for (const [a, b] of take(adjacentPairs(t.indices()), 100)) {
      expect(distanceBetween(bounded(a), bounded(b))).toBe(1);
    }
  });

  it("reads positions", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.element(startPosition)).toBe(1);
    expect(t.element(positionOffsetBy(startPosition, 12))).toBe(6);
    expect(() => t.element(endPosition)).toThrow("Cannot read the unbounded end position");
  });

  it("counts columns", () => {
    expect(ArithmeticTriangle.numberOfColumns(0)).toBe(1);
    expect(ArithmeticTriangle.numberOfColumns(6)).toBe(7);
    expect(ArithmeticTriangle.numberOfColumns(-1)).toBe(0);
  });
});

import { describe, it, expect, afterEach, vi } from "vitest";
import { createTracer } from "@arithmos/core";
import { groupNumber, integerNumber, monoidBigInt } from "@arithmos/std";
import {
  ArithmeticTriangle,
  InvalidIndexError,
  TriangleCache,
  TriangleIndex,
  ordTriangleIndex,
  valueAt,
  type TriangleContext,
} from "../src/index.js";

/** Rows built by plain addition, for comparison. */
function pascalRows(count: number): number[][] {
  const rows: number[][] = [[1]];
  for (let row = 1; row < count; row++) {
    const above = rows[row - 1];
    const next = [1];
    for (let column = 1; column < row; column++) next.push(above[column - 1] + above[column]);
    next.push(1);
    rows.push(next);
  }
  return rows;
}

function integerContext(): TriangleContext<number> {
  return {
    arithmetic: integerNumber,
    base: 1,
    cache: new TriangleCache<number>(),
    tracer: createTracer("triangle"),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("value", () => {
  it("first columns", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.value(0, 0)).toBe(1);
    expect(t.value(1, 0)).toBe(1);
    expect(t.value(2, 0)).toBe(1);
    expect(t.value(3, 0)).toBe(1);
    expect(t.value(100, 0)).toBe(1);
  });

  it("last columns", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.value(1, 1)).toBe(1);
    expect(t.value(2, 2)).toBe(1);
    expect(t.value(3, 3)).toBe(1);
    expect(t.value(100, 100)).toBe(1);
  });

  it("second column", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.value(2, 1)).toBe(2);
    expect(t.value(3, 1)).toBe(3);
    expect(t.value(42, 1)).toBe(42);
    expect(t.value(100, 1)).toBe(100);
  });

  it("penultimate column", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.value(3, 2)).toBe(3);
    expect(t.value(42, 41)).toBe(42);
    expect(t.value(100, 99)).toBe(100);
  });

  it("columns in the middle", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.value(6, 2)).toBe(15);
    expect(t.value(6, 3)).toBe(20);
    expect(t.value(6, 4)).toBe(15);
    expect(t.value(7, 2)).toBe(21);
    expect(t.value(7, 3)).toBe(35);
    expect(t.value(7, 4)).toBe(35);
    expect(t.value(7, 5)).toBe(21);
  });

  it("matches rows built by addition", () => {
    const t = ArithmeticTriangle.integers();
    const rows = pascalRows(25);
    for (let row = 0; row < rows.length; row++) {
      for (let column = 0; column <= row; column++) {
        expect(t.value(row, column)).toBe(rows[row][column]);
      }
    }
  });

  it("holds the edge, symmetry and recurrence identities", () => {
    const t = ArithmeticTriangle.integers();
    for (let row = 0; row <= 30; row++) {
      expect(t.value(row, 0)).toBe(1);
      expect(t.value(row, row)).toBe(1);
      for (let column = 0; column <= row; column++) {
        expect(t.value(row, column)).toBe(t.value(row, row - column));
        if (column > 0 && column < row) {
          expect(t.value(row, column)).toBe(t.value(row - 1, column) + t.value(row - 1, column - 1));
        }
      }
    }
  });

  it("scales with the base", () => {
    const t = new ArithmeticTriangle(monoidBigInt, 3n);
    expect(t.value(0, 0)).toBe(3n);
    expect(t.value(4, 2)).toBe(18n);
    expect(t.value(7, 3)).toBe(105n);
  });

  it("is zero outside the row", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.value(3, 4)).toBe(0);
    expect(t.value(3, -1)).toBe(0);
    expect(new ArithmeticTriangle(monoidBigInt, 1n).value(0, 1)).toBe(0n);
  });

  it("rejects a negative or fractional row or column", () => {
    const t = ArithmeticTriangle.integers();
    expect(() => t.value(-1, 0)).toThrow(InvalidIndexError);
    expect(() => t.value(2.5, 1)).toThrow(InvalidIndexError);
    expect(() => t.value(3, 1.5)).toThrow("A column must be an integer, got 1.5");
  });

  it("reads values at an index", () => {
    const t = new ArithmeticTriangle(groupNumber, 2);
    expect(t.at(new TriangleIndex(5, 2))).toBe(20);
    expect(t.at(new TriangleIndex(5, 5))).toBe(2);
  });

  it("reaches deep rows without exhausting the stack", () => {
    const t = ArithmeticTriangle.integers();
    expect(t.value(20000, 1)).toBe(20000);
    expect(t.value(20000, 2)).toBe(199990000);
    expect(t.value(20000, 19998)).toBe(199990000);
  });
});

describe("memoization", () => {
  it("edges never touch the cache", () => {
    const t = ArithmeticTriangle.integers();
    t.value(100, 0);
    t.value(100, 100);
    t.value(100, 101);
    expect(t.cacheSize).toBe(0);
  });

  it("stores every interior left-half value computed on the way", () => {
    const ctx = integerContext();
    expect(valueAt(ctx, 6, 3)).toBe(20);

    const stored = [...ctx.cache.entries()]
      .sort(([a], [b]) => ordTriangleIndex.compare(a, b))
      .map(([index, value]) => `${index}=${value}`);
    expect(stored).toEqual(["(2, 1)=2", "(3, 1)=3", "(4, 1)=4", "(4, 2)=6", "(5, 2)=10", "(6, 3)=20"]);
  });

  it("reuses stored values and only adds what is missing", () => {
    const t = ArithmeticTriangle.integers();
    t.value(6, 3);
    expect(t.cacheSize).toBe(6);
    t.value(6, 3);
    expect(t.cacheSize).toBe(6);
    expect(t.value(6, 4)).toBe(15);
    expect(t.cacheSize).toBe(8);
  });

  it("traces each fill", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const ctx = integerContext();
    ctx.tracer.enable();
    valueAt(ctx, 2, 1);
    valueAt(ctx, 2, 1);
    valueAt(ctx, 4, 2);
    expect(ctx.tracer.getRecordsFor("cache-fill").map((r) => r.message)).toEqual([
      "(2, 1): 1 entries",
      "(4, 2): 2 entries",
    ]);
  });

  it("negative rows are zero for internal lookups", () => {
    expect(valueAt(integerContext(), -3, 0)).toBe(0);
  });
});

import { describe, it, expect } from "vitest";
import {
  IterableExt,
  adjacentPairs,
  partitioned,
  partitionedUpTo,
  rangeFrom,
  rangeIterator,
} from "../src/index.js";

function upTo(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

describe("adjacentPairs", () => {
  it("empty sequence", () => {
    expect([...adjacentPairs([])]).toEqual([]);
    expect([...adjacentPairs([], { wrapping: true })]).toEqual([]);
  });

  it("one element", () => {
    expect([...adjacentPairs([0])]).toEqual([]);
    expect([...adjacentPairs([0], { wrapping: true })]).toEqual([[0, 0]]);
  });

  it("two elements", () => {
    expect([...adjacentPairs([0, 1])]).toEqual([[0, 1]]);
    expect([...adjacentPairs([0, 1], { wrapping: true })]).toEqual([
      [0, 1],
      [1, 0],
    ]);
  });

  it("three elements", () => {
    expect([...adjacentPairs([0, 1, 2])]).toEqual([
      [0, 1],
      [1, 2],
    ]);
    expect([...adjacentPairs([0, 1, 2], { wrapping: true })]).toEqual([
      [0, 1],
      [1, 2],
      [2, 0],
    ]);
  });

  it("many elements", () => {
    for (let n = 4; n <= 100; n++) {
      const expected = upTo(n - 1).map((i): [number, number] => [i, i + 1]);
      expect([...adjacentPairs(upTo(n))]).toEqual(expected);
      expect([...adjacentPairs(upTo(n), { wrapping: true })]).toEqual([...expected, [n - 1, 0]]);
    }
  });

  it("is lazy over unbounded sources", () => {
    const pairs = adjacentPairs({ [Symbol.iterator]: () => rangeIterator(rangeFrom(0)) });
    const taken: [number, number][] = [];
    for (const pair of pairs) {
      taken.push(pair);
      if (taken.length === 3) break;
    }
    expect(taken).toEqual([
      [0, 1],
      [1, 2],
      [2, 3],
    ]);
  });

  it("can be iterated more than once", () => {
    const pairs = adjacentPairs("abc");
    expect([...pairs]).toEqual([
      ["a", "b"],
      ["b", "c"],
    ]);
    expect([...pairs]).toHaveLength(2);
  });
});

describe("partitioned", () => {
  it("empty input", () => {
    const [matching, nonMatching] = partitioned([], () => true);
    expect(matching).toEqual([]);
    expect(nonMatching).toEqual([]);
  });

  it("splits by predicate", () => {
    const [shortNames, longNames] = partitioned(["Vivien", "Marlon", "Kim", "Karl"], (s) => s.length < 5);
    expect(shortNames).toEqual(["Kim", "Karl"]);
    expect(longNames).toEqual(["Vivien", "Marlon"]);
  });

  it("preserves relative order", () => {
    const isLower = (s: string) => s === s.toLowerCase();
    expect(partitioned(["A", "B", "C", "D"], isLower)).toEqual([[], ["A", "B", "C", "D"]]);
    expect(partitioned(["a", "B", "C", "D"], isLower)).toEqual([["a"], ["B", "C", "D"]]);
    expect(partitioned(["a", "B", "c", "D"], isLower)).toEqual([
      ["a", "c"],
      ["B", "D"],
    ]);
    expect(partitioned(["a", "B", "c", "d"], isLower)).toEqual([["a", "c", "d"], ["B"]]);
  });
});

describe("partitionedUpTo", () => {
  const letters = ["A", "B", "C", "D"];

  it("splits at every valid index", () => {
    expect(partitionedUpTo(letters, 0)).toEqual([[], ["A", "B", "C", "D"]]);
    expect(partitionedUpTo(letters, 1)).toEqual([["A"], ["B", "C", "D"]]);
    expect(partitionedUpTo(letters, 2)).toEqual([
      ["A", "B"],
      ["C", "D"],
    ]);
    expect(partitionedUpTo(letters, 3)).toEqual([["A", "B", "C"], ["D"]]);
    expect(partitionedUpTo(letters, 4)).toEqual([["A", "B", "C", "D"], []]);
  });

  it("rejects indices outside the sequence", () => {
    expect(() => partitionedUpTo(letters, 5)).toThrow(RangeError);
    expect(() => partitionedUpTo(letters, -1)).toThrow(RangeError);
  });
});

describe("IterableExt", () => {
  it("gathers the iterable helpers", () => {
    expect([...IterableExt.adjacentPairs("abc", { wrapping: true })]).toEqual([
      ["a", "b"],
      ["b", "c"],
      ["c", "a"],
    ]);
    expect(IterableExt.partitioned([1, 2, 3, 4], (n) => n % 2 === 0)).toEqual([
      [2, 4],
      [1, 3],
    ]);
    expect(IterableExt.partitionedUpTo("abc", 1)).toEqual([["a"], ["b", "c"]]);
  });
});

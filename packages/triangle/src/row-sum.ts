/**
 * Row-Sum Engine
 *
 * Row `r` sums to `base * 2^r`. Integer arithmetics get that in O(1) from a
 * shift; any other monoid adds up the left half of the row and doubles it.
 */

import { config } from "@arithmos/core";
import { double, isIntegerRing } from "@arithmos/std";
import { valueAt, type TriangleContext } from "./value.js";

/**
 * Sum of every column in `row`; zero for a negative row.
 *
 * Uses `shiftLeft` when the arithmetic is an `IntegerRing` and
 * `triangle.integerFastPath` is on, so overflow behaves as that instance
 * defines it.
 */
export function rowSum<A>(ctx: TriangleContext<A>, row: number): A {
  if (row < 0) return ctx.arithmetic.empty();

  const M = ctx.arithmetic;
  if (isIntegerRing(M) && config.flag("triangle.integerFastPath")) {
    return M.shiftLeft(ctx.base, row);
  }
  return genericRowSum(ctx, row);
}

export function genericRowSum<A>(ctx: TriangleContext<A>, row: number): A {
  const M = ctx.arithmetic;
  if (row < 0) return M.empty();
  if (row === 0) return ctx.base;
  if (row < 4) return double(genericRowSum(ctx, row - 1), M);

  const mid = Math.floor((row + 1) / 2);
  let half = M.empty();
  for (let column = 0; column < mid; column++) {
    half = M.combine(half, valueAt(ctx, row, column));
  }
  const total = double(half, M);
  // Even rows have a middle column of their own.
  return (row + 1) % 2 === 1 ? M.combine(total, valueAt(ctx, row, mid)) : total;
}

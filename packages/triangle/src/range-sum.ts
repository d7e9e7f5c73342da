/**
 * Range-Sum Engine
 *
 * Sums a range of columns in one row. The range is clipped to the row, then
 * `planColumnSum` picks the cheapest strategy that gives the exact sum:
 *
 * | Strategy     | When                                                  |
 * | ------------ | ----------------------------------------------------- |
 * | `empty`      | no column of the row is in the range                  |
 * | `single`     | exactly one column                                    |
 * | `row`        | every column of the row                               |
 * | `small-row`  | rows 0 to 3                                           |
 * | `interior`   | columns within `2...row-2`                            |
 * | `complement` | at most columns `0, 1, row-1, row` left out (Group)   |
 * | `direct`     | any other contiguous range                            |
 * | `strided`    | a step other than 1                                   |
 */

import { invariant, unreachable } from "@arithmos/core";
import {
  combineAll,
  isGroup,
  rangeBounds,
  rangeContains,
  subtract,
  type Range,
} from "@arithmos/std";
import { rowSum } from "./row-sum.js";
import { valueAt, type TriangleContext } from "./value.js";

export type ColumnSumPlan =
  | { readonly strategy: "empty" }
  | { readonly strategy: "single"; readonly column: number }
  | { readonly strategy: "row" }
  | { readonly strategy: "small-row"; readonly first: number; readonly last: number }
  | { readonly strategy: "interior"; readonly first: number; readonly last: number }
  | { readonly strategy: "complement"; readonly excluded: readonly number[] }
  | { readonly strategy: "direct"; readonly first: number; readonly last: number }
  | { readonly strategy: "strided"; readonly columns: readonly number[] };

export type ColumnSumStrategy = ColumnSumPlan["strategy"];

/**
 * Plans the sum of `columns` in `row`. `canSubtract` says whether the element
 * arithmetic has inverses, which the `complement` strategy needs.
 */
export function planColumnSum(columns: Range, row: number, canSubtract: boolean): ColumnSumPlan {
  if (row < 0) return { strategy: "empty" };

  const bounds = rangeBounds(columns);
  if (bounds === undefined) {
    const picked: number[] = [];
    for (let column = 0; column <= row; column++) {
      if (rangeContains(columns, column)) picked.push(column);
    }
    if (picked.length === 0) return { strategy: "empty" };
    if (picked.length === 1) return { strategy: "single", column: picked[0] };
    return { strategy: "strided", columns: picked };
  }

  const first = Math.max(bounds.lower, 0);
  const last = Math.min(bounds.upper, row + 1) - 1;

  if (first > last) return { strategy: "empty" };
  if (first === last) return { strategy: "single", column: first };
  if (first === 0 && last === row) return { strategy: "row" };
  if (row < 4) return { strategy: "small-row", first, last };
  if (first >= 2 && last <= row - 2) return { strategy: "interior", first, last };
  if (canSubtract && first <= 2 && last >= row - 2) {
    const excluded: number[] = [];
    for (let column = 0; column < first; column++) excluded.push(column);
    for (let column = last + 1; column <= row; column++) excluded.push(column);
    return { strategy: "complement", excluded };
  }
  return { strategy: "direct", first, last };
}

export function describePlan(plan: ColumnSumPlan): string {
  switch (plan.strategy) {
    case "empty":
    case "row":
      return plan.strategy;
    case "single":
      return `single ${plan.column}`;
    case "small-row":
    case "interior":
    case "direct":
      return `${plan.strategy} [${plan.first}, ${plan.last}]`;
    case "complement":
      return `complement excluding {${plan.excluded.join(", ")}}`;
    case "strided":
      return `strided {${plan.columns.join(", ")}}`;
    default:
      return unreachable(plan);
  }
}

function sumSpan<A>(ctx: TriangleContext<A>, row: number, first: number, last: number): A {
  let total = ctx.arithmetic.empty();
  for (let column = first; column <= last; column++) {
    total = ctx.arithmetic.combine(total, valueAt(ctx, row, column));
  }
  return total;
}

/**
 * Sum of the values at `columns` in `row`. Columns outside the row count as
 * zero.
 */
export function columnSum<A>(ctx: TriangleContext<A>, columns: Range, row: number): A {
  const M = ctx.arithmetic;
  const plan = planColumnSum(columns, row, isGroup(M));
  ctx.tracer.record("range-sum", `row ${row}: ${describePlan(plan)}`);

  switch (plan.strategy) {
    case "empty":
      return M.empty();
    case "single":
      return valueAt(ctx, row, plan.column);
    case "row":
      return rowSum(ctx, row);
    case "small-row":
    case "interior":
    case "direct":
      return sumSpan(ctx, row, plan.first, plan.last);
    case "complement": {
      invariant(isGroup(M), "complement plan needs a Group arithmetic");
      let total = rowSum(ctx, row);
      for (const column of plan.excluded) {
        total = subtract(total, valueAt(ctx, row, column), M);
      }
      return total;
    }
    case "strided":
      return combineAll(
        plan.columns.map((column) => valueAt(ctx, row, column)),
        M,
      );
    default:
      return unreachable(plan);
  }
}

/**
 * Value Engine
 *
 * `value(r, c) = value(r-1, c) + value(r-1, c-1)`, with the edges fixed at the
 * base. Lookups fold onto the left half by symmetry, then onto the cache.
 * Missing entries are filled bottom-up from an explicit work stack, so the
 * depth of the row never reaches the call stack.
 */

import { invariant, type Tracer } from "@arithmos/core";
import type { Monoid } from "@arithmos/std";
import type { TriangleCache } from "./cache.js";
import { TriangleIndex } from "./triangle-index.js";

/**
 * Everything the engines share for one triangle.
 */
export interface TriangleContext<A> {
  readonly arithmetic: Monoid<A>;
  readonly base: A;
  readonly cache: TriangleCache<A>;
  readonly tracer: Tracer;
}

/**
 * The value at `(row, column)`. Coordinates outside the triangle, including
 * negative rows, are the additive zero.
 */
export function valueAt<A>(ctx: TriangleContext<A>, row: number, column: number): A {
  if (row < 0 || column < 0 || column > row) return ctx.arithmetic.empty();
  if (column === 0 || column === row) return ctx.base;

  const index = new TriangleIndex(row, Math.min(column, row - column));
  const hit = ctx.cache.lookup(index);
  return hit ? hit.value : fill(ctx, index);
}

/**
 * The value of an edge or a cached entry, or else the left-half index that
 * still has to be computed.
 */
function known<A>(ctx: TriangleContext<A>, index: TriangleIndex): { value: A } | TriangleIndex {
  const column = Math.min(index.column, index.row - index.column);
  if (column === 0) return { value: ctx.base };
  const folded = column === index.column ? index : new TriangleIndex(index.row, column);
  return ctx.cache.lookup(folded) ?? folded;
}

function fill<A>(ctx: TriangleContext<A>, target: TriangleIndex): A {
  const stack: TriangleIndex[] = [target];
  let filled = 0;

  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (ctx.cache.has(top)) {
      stack.pop();
      continue;
    }

    // Interior indices always have both parents.
    const [above, aboveLeft] = top.parents();
    const left = aboveLeft === undefined ? { value: ctx.arithmetic.empty() } : known(ctx, aboveLeft);
    const right = above === undefined ? { value: ctx.arithmetic.empty() } : known(ctx, above);

    if (left instanceof TriangleIndex || right instanceof TriangleIndex) {
      if (left instanceof TriangleIndex) stack.push(left);
      if (right instanceof TriangleIndex && !(left instanceof TriangleIndex && left.equals(right))) {
        stack.push(right);
      }
      continue;
    }

    ctx.cache.store(top, ctx.arithmetic.combine(right.value, left.value));
    filled++;
    stack.pop();
  }

  ctx.tracer.record("cache-fill", `${target}: ${filled} entries`);

  const entry = ctx.cache.lookup(target);
  invariant(entry !== undefined, `cache fill did not reach ${target}`);
  return entry.value;
}

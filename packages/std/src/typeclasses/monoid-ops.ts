/**
 * Generic Monoid Operations
 *
 * Derived operations for any type with a Monoid instance, in dictionary-passing
 * style.
 *
 * @example
 * ```typescript
 * import { combineAll, double, monoidNumber } from "@arithmos/std";
 *
 * combineAll([1, 2, 3, 4, 5], monoidNumber); // 15
 * double(21, monoidNumber); // 42
 * ```
 */

import type { Monoid, Semigroup } from "./index.js";

/**
 * Combine all elements of an iterable, left to right.
 *
 * @returns The combination of all elements, or `empty()` if there are none
 */
export function combineAll<A>(xs: Iterable<A>, M: Monoid<A>): A {
  let acc = M.empty();
  for (const x of xs) {
    acc = M.combine(acc, x);
  }
  return acc;
}

/**
 * `combine(a, a)`.
 */
export function double<A>(a: A, S: Semigroup<A>): A {
  return S.combine(a, a);
}

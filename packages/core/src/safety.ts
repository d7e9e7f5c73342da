/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — runtime assertion
 * - `unreachable(value?)` — mark impossible code paths
 *
 * @example
 * ```typescript
 * function columnsIn(row: number): number {
 *   invariant(Number.isInteger(row), "row must be an integer");
 *   return row + 1;
 * }
 *
 * type Plan = { kind: "empty" } | { kind: "row"; row: number };
 * function cost(plan: Plan): number {
 *   switch (plan.kind) {
 *     case "empty": return 0;
 *     case "row": return 1;
 *     default: return unreachable(plan);
 *   }
 * }
 * ```
 */

import { InvariantError } from "./errors.js";

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if `condition` is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Passing the narrowed value makes the
 * compiler reject any unhandled union member.
 */
export function unreachable(value?: never): never {
  throw new InvariantError(
    value === undefined ? "Unreachable code reached" : `Unreachable case: ${String(value)}`,
  );
}

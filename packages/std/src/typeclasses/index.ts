/**
 * Standard Typeclasses
 *
 * Instances are plain dictionaries passed explicitly to the functions and
 * structures that need them (`new ArithmeticTriangle(integerNumber, 1)`).
 *
 * Algebraic chain used for triangle elements:
 *
 *   Semigroup → Monoid → Group → IntegerRing
 *
 * A Monoid is enough to build a triangle. A Group additionally lets range sums
 * subtract excluded columns from a row total, and an IntegerRing provides the
 * unit element and the power-of-two shift behind O(1) row sums.
 */

import { OverflowError } from "../errors.js";

// ============================================================================
// Eq — types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

// ============================================================================
// Ord — types supporting total ordering.
// ============================================================================

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

export const ordNumber: Ord<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

/**
 * Create an Ord instance from a comparison function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    compare,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

// ============================================================================
// Hash — types usable as hash-table keys (together with Eq).
// ============================================================================

/**
 * Hash typeclass. Values that are `equals` must hash equally.
 * Not cryptographic; only for bucketing.
 */
export interface Hash<A> {
  hash(a: A): number;
}

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) return a | 0;
    return hashString.hash(String(a));
  },
};

export const hashString: Hash<string> = {
  hash: (a) => {
    // djb2
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0;
  },
};

/**
 * Combine two hashes into one (order-sensitive).
 */
export function combineHashes(h1: number, h2: number): number {
  return (Math.imul(h1, 31) + h2) | 0;
}

// ============================================================================
// Semigroup — types with an associative binary operation.
// ============================================================================

/**
 * Semigroup typeclass - types with an associative combine operation.
 *
 * Law:
 * - Associativity: `combine(combine(a, b), c) === combine(a, combine(b, c))`
 */
export interface Semigroup<A> {
  combine(a: A, b: A): A;
}

// ============================================================================
// Monoid — Semigroup with an identity element.
// ============================================================================

/**
 * Monoid typeclass - Semigroup with an identity element.
 *
 * Laws (in addition to Semigroup laws):
 * - Left identity: `combine(empty(), a) === a`
 * - Right identity: `combine(a, empty()) === a`
 */
export interface Monoid<A> extends Semigroup<A> {
  empty(): A;
}

export const monoidNumber: Monoid<number> = {
  combine: (a, b) => a + b,
  empty: () => 0,
};

export const monoidBigInt: Monoid<bigint> = {
  combine: (a, b) => a + b,
  empty: () => 0n,
};

// ============================================================================
// Group — Monoid with an inverse operation.
// ============================================================================

/**
 * Group typeclass - a Monoid with an inverse operation.
 *
 * Laws:
 * - All Monoid laws (associativity, identity)
 * - Left inverse: `combine(invert(a), a) === empty()`
 * - Right inverse: `combine(a, invert(a)) === empty()`
 *
 * @example
 * ```typescript
 * const additiveGroup: Group<number> = {
 *   empty: () => 0,
 *   combine: (a, b) => a + b,
 *   invert: (a) => -a,
 * };
 * ```
 */
export interface Group<A> extends Monoid<A> {
  /** Inverse operation: combine(invert(a), a) === empty() */
  invert(a: A): A;
}

/** Additive group for numbers (identity: 0, operation: +, inverse: negation) */
export const groupNumber: Group<number> = {
  empty: () => 0,
  combine: (a, b) => a + b,
  invert: (a) => -a,
};

/** Additive group for bigint */
export const groupBigInt: Group<bigint> = {
  empty: () => 0n,
  combine: (a, b) => a + b,
  invert: (a) => -a,
};

export function isGroup<A>(M: Monoid<A>): M is Group<A> {
  return "invert" in M && typeof M.invert === "function";
}

/**
 * `combine(a, invert(b))`.
 */
export function subtract<A>(a: A, b: A, G: Group<A>): A {
  return G.combine(a, G.invert(b));
}

// ============================================================================
// IntegerRing — binary integers: a unit and multiplication by powers of two.
// ============================================================================

/**
 * IntegerRing typeclass - an additive group of binary integers.
 *
 * `shiftLeft(a, bits)` multiplies by `2^bits`. What happens when the result
 * does not fit is up to the instance: `integerNumber` throws
 * {@link OverflowError}, `integerInt32` wraps around, `integerBigInt` never
 * overflows.
 *
 * Laws:
 * - `shiftLeft(a, 0) === a`
 * - `shiftLeft(a, n + 1) === combine(shiftLeft(a, n), shiftLeft(a, n))`
 */
export interface IntegerRing<A> extends Group<A> {
  one(): A;
  shiftLeft(a: A, bits: number): A;
}

function checkShift(bits: number): void {
  if (!Number.isInteger(bits) || bits < 0) {
    throw new RangeError(`shift amount must be a non-negative integer, got ${bits}`);
  }
}

/**
 * Integers represented as `number`. Additions follow IEEE arithmetic; shifts
 * that leave the safe-integer range throw.
 */
export const integerNumber: IntegerRing<number> = {
  empty: () => 0,
  one: () => 1,
  combine: (a, b) => a + b,
  invert: (a) => -a,
  shiftLeft: (a, bits) => {
    checkShift(bits);
    const result = a * 2 ** bits;
    if (!Number.isSafeInteger(result)) {
      throw new OverflowError(`${a} << ${bits}`, "number");
    }
    return result;
  },
};

export const integerBigInt: IntegerRing<bigint> = {
  empty: () => 0n,
  one: () => 1n,
  combine: (a, b) => a + b,
  invert: (a) => -a,
  shiftLeft: (a, bits) => {
    checkShift(bits);
    return a << BigInt(bits);
  },
};

/**
 * 32-bit two's complement integers. Every operation wraps around.
 */
export const integerInt32: IntegerRing<number> = {
  empty: () => 0,
  one: () => 1,
  combine: (a, b) => (a + b) | 0,
  invert: (a) => -a | 0,
  shiftLeft: (a, bits) => {
    checkShift(bits);
    // `<<` only looks at the low five bits of its right operand.
    return bits >= 32 ? 0 : (a << bits) | 0;
  },
};

export function isIntegerRing<A>(M: Monoid<A>): M is IntegerRing<A> {
  return (
    isGroup(M) &&
    "one" in M &&
    typeof M.one === "function" &&
    "shiftLeft" in M &&
    typeof M.shiftLeft === "function"
  );
}

// Re-export generic monoid operations
export * from "./monoid-ops.js";

/**
 * TriangleCache<A> — memoized interior values, bucketed by index hash.
 *
 * Only the interior of the left half (`0 < column <= row / 2`) is stored: the
 * edges always hold the base, and the right half mirrors the left. Entries are
 * never evicted.
 */

import { invariant } from "@arithmos/core";
import type { Eq, Hash } from "@arithmos/std";
import { TriangleIndex, eqTriangleIndex, hashTriangleIndex } from "./triangle-index.js";

interface Entry<A> {
  key: TriangleIndex;
  value: A;
}

/** Whether `index` lies in the region the cache stores. */
export function isCacheable(index: TriangleIndex): boolean {
  return index.column > 0 && index.column * 2 <= index.row;
}

export class TriangleCache<A> {
  private readonly _eq: Eq<TriangleIndex>;
  private readonly _hash: Hash<TriangleIndex>;
  private readonly _buckets = new Map<number, Entry<A>[]>();
  private _size = 0;

  constructor(eq: Eq<TriangleIndex> = eqTriangleIndex, hash: Hash<TriangleIndex> = hashTriangleIndex) {
    this._eq = eq;
    this._hash = hash;
  }

  get size(): number {
    return this._size;
  }

  private _findEntry(bucket: Entry<A>[], index: TriangleIndex): Entry<A> | undefined {
    for (let i = 0; i < bucket.length; i++) {
      if (this._eq.equals(index, bucket[i].key)) return bucket[i];
    }
    return undefined;
  }

  /**
   * The stored entry for `index`. Returns the entry rather than the value so
   * that a stored `undefined`-like element is still a hit.
   */
  lookup(index: TriangleIndex): { value: A } | undefined {
    const bucket = this._buckets.get(this._hash.hash(index));
    if (!bucket) return undefined;
    return this._findEntry(bucket, index);
  }

  has(index: TriangleIndex): boolean {
    return this.lookup(index) !== undefined;
  }

  /**
   * @throws InvariantError if `index` is outside the interior left half
   */
  store(index: TriangleIndex, value: A): void {
    invariant(isCacheable(index), `cache only stores interior left-half entries, got ${index}`);

    const h = this._hash.hash(index);
    const bucket = this._buckets.get(h);
    if (!bucket) {
      this._buckets.set(h, [{ key: index, value }]);
      this._size++;
      return;
    }
    const entry = this._findEntry(bucket, index);
    if (entry) {
      entry.value = value;
    } else {
      bucket.push({ key: index, value });
      this._size++;
    }
  }

  *entries(): IterableIterator<[TriangleIndex, A]> {
    for (const bucket of this._buckets.values()) {
      for (const { key, value } of bucket) yield [key, value];
    }
  }
}

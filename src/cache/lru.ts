import { tagged } from "./log.js";
import type { Entry, EvictCallback } from "./types.js";

function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new RangeError(tagged("must provide a positive size"));
  }
}

// boxed so that a stored `undefined` is still a hit
interface Slot<V> {
  value: V;
}

/**
 * Fixed size LRU cache, not safe for re-entrant use.
 *
 * Order lives in the backing `Map`: iteration is insertion order, so the
 * first key is the oldest and re-inserting a key marks it as the newest.
 *
 * ```ts
 * const cache = new LRUCache<string, number>(2, (k, v) => console.log(k, v));
 * cache.add("a", 1);
 * cache.add("b", 2);
 * cache.get("a");
 * cache.add("c", 3); // logs "b 2"
 * ```
 */
export class LRUCache<K, V> {
  private items: Map<K, Slot<V>>;
  private limit: number;

  constructor(
    capacity: number,
    private readonly onEvict?: EvictCallback<K, V>
  ) {
    assertCapacity(capacity);
    this.limit = capacity;
    this.items = new Map();
  }

  get size(): number {
    return this.items.size;
  }

  get capacity(): number {
    return this.limit;
  }

  /**
   * Insert or overwrite a value and mark it as the newest entry.
   * Returns true when the oldest entry had to be evicted.
   */
  add(key: K, value: V): boolean {
    // existing → move to MRU before overwriting
    this.items.delete(key);
    this.items.set(key, { value });

    const evict = this.items.size > this.limit;
    if (evict) {
      this.removeOldest();
    }
    return evict;
  }

  /**
   * Look up a value, marking it as the newest entry on a hit.
   */
  get(key: K): V | undefined {
    const slot = this.items.get(key);
    if (!slot) return undefined;

    this.items.delete(key);
    this.items.set(key, slot);
    return slot.value;
  }

  /**
   * Look up a value without touching its recency.
   */
  peek(key: K): V | undefined {
    return this.items.get(key)?.value;
  }

  contains(key: K): boolean {
    return this.items.has(key);
  }

  /**
   * Returns whether the key was present.
   */
  remove(key: K): boolean {
    return this.pop(key) !== undefined;
  }

  /**
   * Remove a key and hand back its entry.
   */
  pop(key: K): Entry<K, V> | undefined {
    const slot = this.items.get(key);
    if (!slot) return undefined;
    this.removeEntry(key, slot.value);
    return [key, slot.value];
  }

  removeOldest(): Entry<K, V> | undefined {
    const oldest = this.getOldest();
    if (oldest) {
      this.removeEntry(oldest[0], oldest[1]);
    }
    return oldest;
  }

  getOldest(): Entry<K, V> | undefined {
    const next = this.items.entries().next();
    if (next.done) return undefined;
    const [key, slot] = next.value;
    return [key, slot.value];
  }

  /** Keys from oldest to newest. */
  keys(): K[] {
    return Array.from(this.items.keys());
  }

  /** Values from oldest to newest. */
  values(): V[] {
    return Array.from(this.items.values(), (slot) => slot.value);
  }

  entries(): Entry<K, V>[] {
    return Array.from(
      this.items,
      ([key, slot]): Entry<K, V> => [key, slot.value]
    );
  }

  /**
   * Change the capacity, evicting the oldest entries that no longer fit.
   * Returns the number of evictions.
   */
  resize(capacity: number): number {
    assertCapacity(capacity);
    const diff = Math.max(0, this.items.size - capacity);
    for (let i = 0; i < diff; i++) {
      this.removeOldest();
    }
    this.limit = capacity;
    return diff;
  }

  /**
   * Remove every entry, notifying `onEvict` once for each.
   */
  purge(): void {
    for (const [key, value] of this.entries()) {
      this.removeEntry(key, value);
    }
  }

  private removeEntry(key: K, value: V): void {
    this.items.delete(key);
    this.onEvict?.(key, value);
  }
}

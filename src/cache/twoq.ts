import { Lock } from "./lock.js";
import { debug, tagged } from "./log.js";
import { LRUCache } from "./lru.js";

import type { Entry, EvictCallback, Pool, TwoQueueOptions } from "./types.js";

/**
 * Share of the cache dedicated to entries that have only been seen once.
 */
export const DEFAULT_RECENT_RATIO = 0.25;

/**
 * Default size of the ghost pool tracking keys recently evicted from the
 * recent pool, as a share of the cache size.
 */
export const DEFAULT_GHOST_RATIO = 0.5;

function assertSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(tagged("invalid size"));
  }
}

function assertRatio(name: string, ratio: number): void {
  if (!Number.isFinite(ratio) || ratio < 0 || ratio > 1) {
    throw new RangeError(tagged(`invalid ${name} ratio`));
  }
}

/**
 * Fixed size 2Q cache.
 *
 * 2Q keeps entries seen once (`recent`) apart from entries seen at least
 * twice (`frequent`), so a burst of one-off keys cannot flush the entries
 * that are actually reused. Keys pushed out of `recent` are remembered in a
 * ghost pool without their value; adding one of them again goes straight to
 * `frequent`.
 *
 * Every operation runs under one exclusive lock. `onEvict` runs inside it and
 * must not call back into the cache.
 */
export class TwoQueueCache<K, V> {
  private limit: number;
  private recentSize: number;

  private readonly recentRatio: number;
  private readonly ghostRatio: number;
  private readonly onEvict?: EvictCallback<K, V>;
  private readonly verbose: boolean;

  // recent and frequent are both sized to the whole cache;
  // ensureSpace is what keeps them balanced
  private readonly recent: LRUCache<K, V>;
  private readonly frequent: LRUCache<K, V>;
  private recentEvict: LRUCache<K, undefined> | null;

  private readonly lock = new Lock();

  constructor(size: number, options: TwoQueueOptions<K, V> = {}) {
    const {
      recentRatio = DEFAULT_RECENT_RATIO,
      ghostRatio = DEFAULT_GHOST_RATIO,
      onEvict,
      debug: verbose = false,
    } = options;

    assertSize(size);
    assertRatio("recent", recentRatio);
    assertRatio("ghost", ghostRatio);

    this.limit = size;
    this.recentRatio = recentRatio;
    this.ghostRatio = ghostRatio;
    this.recentSize = Math.floor(size * recentRatio);
    this.onEvict = onEvict;
    this.verbose = verbose;

    this.recent = new LRUCache(size);
    this.frequent = new LRUCache(size);
    this.recentEvict = this.ghosts(Math.floor(size * ghostRatio));

    if (this.verbose) {
      debug(
        `2Q cache size=${size} recent=${this.recentSize} ghosts=${
          this.recentEvict?.capacity ?? 0
        }`
      );
    }
  }

  get capacity(): number {
    return this.lock.run(() => this.limit);
  }

  /**
   * Number of cached entries; ghosts are not counted.
   */
  get size(): number {
    return this.lock.run(() => this.recent.size + this.frequent.size);
  }

  /**
   * Look up a key. A hit in `recent` promotes the entry to `frequent`.
   */
  get(key: K): V | undefined {
    return this.lock.run(() => {
      if (this.frequent.contains(key)) {
        return this.frequent.get(key);
      }

      // seen twice now → promote
      const promoted = this.recent.pop(key);
      if (promoted) {
        this.frequent.add(key, promoted[1]);
        return promoted[1];
      }

      return undefined;
    });
  }

  add(key: K, value: V): void {
    this.lock.run(() => {
      if (this.frequent.contains(key)) {
        this.frequent.add(key, value);
        return;
      }

      if (this.recent.contains(key)) {
        this.recent.remove(key);
        this.frequent.add(key, value);
        return;
      }

      // recently evicted from recent, so this is its second touch
      if (this.recentEvict?.contains(key)) {
        this.ensureSpace(true);
        this.recentEvict.remove(key);
        this.frequent.add(key, value);
        return;
      }

      this.ensureSpace(false);
      this.recent.add(key, value);
    });
  }

  /**
   * Remove a key from whichever pool holds it, ghosts included.
   * `onEvict` fires for a cached entry, not for a ghost.
   */
  remove(key: K): boolean {
    return this.lock.run(() => {
      const removed = this.frequent.pop(key) ?? this.recent.pop(key);
      if (removed) {
        this.onEvict?.(removed[0], removed[1]);
        return true;
      }
      return this.recentEvict?.remove(key) ?? false;
    });
  }

  contains(key: K): boolean {
    return this.lock.run(
      () => this.frequent.contains(key) || this.recent.contains(key)
    );
  }

  /**
   * Read a value without promoting it or touching its recency.
   */
  peek(key: K): V | undefined {
    return this.lock.run(() =>
      this.frequent.contains(key)
        ? this.frequent.peek(key)
        : this.recent.peek(key)
    );
  }

  /**
   * Frequent keys first, then recent keys, each oldest first.
   */
  keys(): K[] {
    return this.lock.run(() => [...this.frequent.keys(), ...this.recent.keys()]);
  }

  /** Values in the same order as `keys()`. */
  values(): V[] {
    return this.lock.run(() => [
      ...this.frequent.values(),
      ...this.recent.values(),
    ]);
  }

  /**
   * Change the cache size, evicting entries that no longer fit.
   * Returns the number of evicted entries.
   */
  resize(size: number): number {
    return this.lock.run(() => {
      assertSize(size);

      this.limit = size;
      this.recentSize = Math.floor(size * this.recentRatio);

      const diff = Math.max(0, this.recent.size + this.frequent.size - size);
      for (let i = 0; i < diff; i++) {
        this.ensureSpace(true);
      }

      this.recent.resize(size);
      this.frequent.resize(size);
      this.recentEvict = this.ghosts(
        Math.floor(size * this.ghostRatio),
        this.recentEvict
      );

      if (this.verbose) {
        debug(`resized to ${size}, evicted ${diff}`);
      }
      return diff;
    });
  }

  /**
   * Clear every pool. `onEvict` fires once per cached entry, frequent
   * entries first.
   */
  purge(): void {
    this.lock.run(() => {
      const entries = [...this.frequent.entries(), ...this.recent.entries()];
      this.recent.purge();
      this.frequent.purge();
      this.recentEvict?.purge();

      for (const [key, value] of entries) {
        this.onEvict?.(key, value);
      }
    });
  }

  /**
   * Make room for one more entry if the cache is full.
   *
   * `recent` gives way while it is above its target, or at it unless the
   * incoming key is a returning ghost. Otherwise the oldest frequent entry
   * goes, and it is not remembered as a ghost.
   */
  private ensureSpace(recentEvict: boolean): void {
    const recentLen = this.recent.size;
    const freqLen = this.frequent.size;
    if (recentLen + freqLen < this.limit) {
      return;
    }

    if (
      recentLen > 0 &&
      (recentLen > this.recentSize ||
        (recentLen === this.recentSize && !recentEvict))
    ) {
      const oldest = this.recent.removeOldest();
      if (oldest) {
        this.recentEvict?.add(oldest[0], undefined);
        this.evicted("recent", oldest);
      }
      return;
    }

    const oldest = this.frequent.removeOldest();
    if (oldest) {
      this.evicted("frequent", oldest);
    }
  }

  private evicted(pool: Pool, [key, value]: Entry<K, V>): void {
    if (this.verbose) {
      debug(`evicted ${String(key)} from ${pool}`);
    }
    this.onEvict?.(key, value);
  }

  private ghosts(
    size: number,
    current: LRUCache<K, undefined> | null = null
  ): LRUCache<K, undefined> | null {
    if (size <= 0) {
      current?.purge();
      return null;
    }
    if (current) {
      current.resize(size);
      return current;
    }
    return new LRUCache(size);
  }
}

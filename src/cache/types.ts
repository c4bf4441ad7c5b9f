/**
 * Called with the last known key and value of an entry leaving a cache.
 *
 * Runs synchronously inside the operation that caused it, so it must not
 * call back into the same cache.
 */
export type EvictCallback<K, V> = (key: K, value: V) => void;

export type Entry<K, V> = [key: K, value: V];

export interface TwoQueueOptions<K, V> {
  /**
   * Share of the cache kept for entries seen only once.
   * Defaults to `DEFAULT_RECENT_RATIO`
   */
  recentRatio?: number;
  /**
   * Size of the ghost pool, as a share of the cache size.
   * `0` disables ghost tracking
   */
  ghostRatio?: number;
  /**
   * Fired for every cached entry that leaves the cache, whether evicted,
   * removed or purged. Moves between pools and ghosts do not fire it
   */
  onEvict?: EvictCallback<K, V>;
  /**
   * Log parameters and evictions through `console.debug`
   */
  debug?: boolean;
}

export type Pool = "recent" | "frequent";

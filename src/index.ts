export { LRUCache } from "./cache/lru.js";
export {
  TwoQueueCache,
  DEFAULT_GHOST_RATIO,
  DEFAULT_RECENT_RATIO,
} from "./cache/twoq.js";

export type { Entry, EvictCallback, TwoQueueOptions } from "./cache/types.js";

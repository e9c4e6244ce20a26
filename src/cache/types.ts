/**
 * Cache Types for one-inventory
 */

import type { VmRecord } from '../core/types.js';

/**
 * Persisted cache entry, one per cache key
 */
export interface CacheEntry {
  /** Schema version for migrations */
  version: 1;
  /** Cache key the entry was written under */
  key: string;
  /** ISO timestamp of the query the records come from */
  createdAt: string;
  /** Records in pool order */
  records: VmRecord[];
}

/**
 * Key-value storage behind the cache manager
 */
export interface CacheStore {
  /** Read an entry, or undefined when there is none */
  get(key: string): Promise<CacheEntry | undefined>;
  set(key: string, entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * Storage backends selectable with `cache_plugin`
 */
export type CachePluginName = 'memory' | 'jsonfile';

/**
 * Which side of the cache a run touches
 */
export interface CachePlan {
  readCache: boolean;
  writeCache: boolean;
}

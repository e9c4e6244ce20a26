/**
 * Cache Manager
 *
 * Decides when a run reads or writes cached query results, and keeps the
 * entries fresh according to the configured timeout.
 */

import { resolve } from 'node:path';

import type { CachePlan, CacheStore } from './types.js';
import type { VmRecord } from '../core/types.js';
import { computeContentHash } from '../lib/hash.js';
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';

/**
 * Prefix of every cache key
 */
export const CACHE_KEY_PREFIX = 'one_inventory';

/**
 * Derive the cache key for an inventory source.
 *
 * The path is made absolute with forward slashes, so the same file always
 * maps to the same key. Case is kept: `Prod.one.yaml` and `prod.one.yaml`
 * are different sources on case-sensitive filesystems.
 *
 * @param sourcePath - Path to the inventory configuration file
 * @returns `one_inventory_<hash8>`
 */
export function getCacheKey(sourcePath: string): string {
  const normalizedPath = resolve(sourcePath).replace(/\\/g, '/');
  return `${CACHE_KEY_PREFIX}_${computeContentHash(normalizedPath)}`;
}

/**
 * Options for constructing a CacheManager
 */
export interface CacheManagerOptions {
  store: CacheStore;
  /** `cache` option of the inventory configuration */
  enabled: boolean;
  /** Seconds before an entry expires; 0 disables expiry */
  timeout: number;
  diagnostics?: Diagnostics;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * Read/write policy over a CacheStore.
 */
export class CacheManager {
  private readonly store: CacheStore;
  private readonly enabled: boolean;
  private readonly timeout: number;
  private readonly diagnostics: Diagnostics;
  private readonly now: () => Date;

  constructor(options: CacheManagerOptions) {
    this.store = options.store;
    this.enabled = options.enabled;
    this.timeout = options.timeout;
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Compute which side of the cache this run uses.
   *
   * @param useCache - False when the caller asked for a forced refresh
   */
  plan(useCache: boolean): CachePlan {
    return {
      readCache: this.enabled && useCache,
      writeCache: this.enabled && !useCache,
    };
  }

  /**
   * Get cached records.
   *
   * Expired entries are dropped from the store.
   *
   * @returns Records, or undefined on a miss (absent, invalid or expired)
   */
  async get(key: string): Promise<VmRecord[] | undefined> {
    const entry = await this.store.get(key);
    if (!entry) {
      this.diagnostics.vvv(`Cache miss for ${key}`);
      return undefined;
    }

    if (entry.key !== key) {
      this.diagnostics.vvv(`Cache entry under ${key} belongs to ${entry.key}, ignoring it`);
      return undefined;
    }

    if (this.isExpired(entry.createdAt)) {
      this.diagnostics.vvv(`Cache entry ${key} from ${entry.createdAt} has expired`);
      await this.invalidate(key);
      return undefined;
    }

    this.diagnostics.vv(`Using ${entry.records.length} cached VM records from ${entry.createdAt}`);
    return entry.records;
  }

  /**
   * Replace the cached records for a key.
   */
  async put(key: string, records: readonly VmRecord[]): Promise<void> {
    await this.store.set(key, {
      version: 1,
      key,
      createdAt: this.now().toISOString(),
      records: [...records],
    });
    this.diagnostics.vv(`Cached ${records.length} VM records under ${key}`);
  }

  /**
   * Drop the cached records for a key.
   */
  async invalidate(key: string): Promise<void> {
    await this.store.delete(key);
  }

  private isExpired(createdAt: string): boolean {
    if (this.timeout <= 0) {
      return false;
    }
    const created = Date.parse(createdAt);
    if (Number.isNaN(created)) {
      return true;
    }
    return this.now().getTime() - created > this.timeout * 1000;
  }
}

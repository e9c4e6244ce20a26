/**
 * Cache Stores
 *
 * Storage backends for cached query results. Entries read back from disk
 * are validated before use; anything that does not match the schema is
 * treated as absent.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import Ajv from 'ajv';
import addFormats from 'ajv-formats';

import type { CacheEntry, CacheStore } from './types.js';
import cacheEntrySchema from './schema.json' with { type: 'json' };
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';

const ajv = new Ajv.default({ allErrors: true, strict: false });
addFormats.default(ajv);

const validateEntry = ajv.compile<CacheEntry>(cacheEntrySchema);

/**
 * Check that parsed data is a well-formed cache entry.
 */
export function isCacheEntry(data: unknown): data is CacheEntry {
  return validateEntry(data);
}

/**
 * Process-local store. Entries are copied in and out so callers never share
 * references with the store.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<CacheEntry | undefined> {
    const serialized = this.entries.get(key);
    if (serialized === undefined) {
      return undefined;
    }
    const parsed: unknown = JSON.parse(serialized);
    return isCacheEntry(parsed) ? parsed : undefined;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, JSON.stringify(entry));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}

/**
 * Stores each entry as `<directory>/<key>.json`.
 *
 * All writes are atomic (write to temp, then rename).
 */
export class JsonFileCacheStore implements CacheStore {
  constructor(
    private readonly directory: string,
    private readonly diagnostics: Diagnostics = silentDiagnostics
  ) {}

  /**
   * Get the file path for a key.
   */
  getEntryPath(key: string): string {
    return join(this.directory, `${key}.json`);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const path = this.getEntryPath(key);
    let content: string;

    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      this.diagnostics.warning(`Ignoring unreadable cache file ${path}`);
      return undefined;
    }

    if (!isCacheEntry(parsed)) {
      this.diagnostics.warning(`Ignoring cache file ${path}: it does not match the cache schema`);
      return undefined;
    }
    return parsed;
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    const path = this.getEntryPath(key);

    // Ensure directory exists
    await mkdir(this.directory, { recursive: true });

    // Write to temp file first
    const tempPath = `${path}.tmp`;
    await writeFile(tempPath, JSON.stringify(entry, null, 2), 'utf-8');

    // Atomic rename
    await rename(tempPath, path);
  }

  async delete(key: string): Promise<void> {
    await rm(this.getEntryPath(key), { force: true });
  }
}

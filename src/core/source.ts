/**
 * Inventory Source
 *
 * Entry point of an inventory run: reads the configuration, decides how
 * the cache is used, queries OpenNebula when needed and populates the
 * inventory. Any fatal error aborts the run before an inventory is
 * returned.
 */

import { ConfigLoadError, loadInventoryFile } from '../config/loader.js';
import { resolveConfig } from '../config/resolver.js';
import type { ResolvedInventoryConfig } from '../config/types.js';
import { validateConfig } from '../config/validator.js';
import { CacheManager, getCacheKey } from '../cache/manager.js';
import { JsonFileCacheStore, MemoryCacheStore } from '../cache/store.js';
import type { CacheStore } from '../cache/types.js';
import { HttpTransport, OneClient, type OneApi } from '../opennebula/index.js';
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';
import { lookupNetworkDomain, VmRecordBuilder } from './builder.js';
import { ConstructedEvaluator } from './constructed.js';
import { ConfigError, NotFoundError } from './errors.js';
import { HostnameResolver } from './hostname.js';
import { Inventory } from './inventory.js';
import { InventoryPopulator } from './populator.js';
import type { VmRecord } from './types.js';

/**
 * Factories and settings for an InventorySource
 */
export interface InventorySourceOptions {
  diagnostics?: Diagnostics;
  /** Environment for ONE_URL / ONE_USERNAME / ONE_PASSWORD */
  env?: NodeJS.ProcessEnv;
  /** Build the API client (default: OneClient over HttpTransport) */
  createApi?: (config: ResolvedInventoryConfig, diagnostics: Diagnostics) => OneApi;
  /** Build the cache store (default: chosen by cache_plugin) */
  createStore?: (config: ResolvedInventoryConfig, diagnostics: Diagnostics) => CacheStore;
}

/**
 * Options for a single run
 */
export interface ParseOptions {
  /** False forces a fresh query (the cache is still written if enabled) */
  useCache?: boolean;
}

/**
 * Outcome of a run
 */
export interface InventoryRun {
  inventory: Inventory;
  config: ResolvedInventoryConfig;
  records: VmRecord[];
  /** Hostnames in record order */
  hostnames: string[];
  cacheKey: string;
  fromCache: boolean;
}

/**
 * Convert a loader failure into a ConfigError.
 */
export function toConfigError(error: ConfigLoadError): ConfigError {
  switch (error.reason) {
    case 'not_found':
    case 'unreadable':
      return new ConfigError(
        error.message,
        'CONFIG_NOT_FOUND',
        'Ensure the inventory file exists and is readable.',
        error.filePath
      );
    case 'invalid_yaml':
      return new ConfigError(error.message, 'CONFIG_INVALID_YAML', undefined, error.filePath);
    case 'unrecognized':
      return new ConfigError(
        error.message,
        'CONFIG_UNRECOGNIZED',
        'Rename the file so it ends in one.yaml or one.yml.',
        error.filePath
      );
  }
}

/**
 * Load, validate and resolve an inventory configuration file.
 *
 * @throws ConfigError for unrecognized, unreadable or invalid files
 * @throws InvalidOptionError for unrecognized enumerated values
 */
export async function readInventoryConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ResolvedInventoryConfig> {
  let raw: unknown;
  try {
    raw = await loadInventoryFile(path);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw toConfigError(error);
    }
    throw error;
  }

  const validation = validateConfig(raw);
  if (!validation.valid) {
    throw new ConfigError(
      `Invalid inventory configuration: ${path}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed options.',
      path,
      validation.errors.map(({ path: errorPath, message }) => ({ path: errorPath, message }))
    );
  }

  return resolveConfig(validation.config, path, env);
}

function defaultApi(config: ResolvedInventoryConfig, diagnostics: Diagnostics): OneApi {
  const transport = new HttpTransport({
    url: config.url,
    timeout: config.timeout,
    diagnostics,
  });
  return new OneClient(transport, OneClient.session(config.username, config.password));
}

/**
 * Runs the inventory pipeline for OpenNebula configuration files.
 */
export class InventorySource {
  private readonly diagnostics: Diagnostics;
  private readonly env: NodeJS.ProcessEnv;
  private readonly createApi: (config: ResolvedInventoryConfig, diagnostics: Diagnostics) => OneApi;
  private readonly createStore: (config: ResolvedInventoryConfig, diagnostics: Diagnostics) => CacheStore;
  // Shared by every run of this source when cache_plugin is memory
  private readonly memoryStore = new MemoryCacheStore();

  constructor(options: InventorySourceOptions = {}) {
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
    this.env = options.env ?? process.env;
    this.createApi = options.createApi ?? defaultApi;
    this.createStore =
      options.createStore ??
      ((config, diagnostics) =>
        config.cache.plugin === 'memory'
          ? this.memoryStore
          : new JsonFileCacheStore(config.cache.connection, diagnostics));
  }

  /**
   * Run the inventory for a configuration file.
   *
   * @param path - Path to a `*one.yaml` / `*one.yml` file
   * @param options - Run options
   */
  async parse(path: string, options: ParseOptions = {}): Promise<InventoryRun> {
    const useCache = options.useCache ?? true;
    const config = await readInventoryConfig(path, this.env);
    const api = this.createApi(config, this.diagnostics);

    const cacheKey = getCacheKey(config.configPath);
    const cache = new CacheManager({
      store: this.createStore(config, this.diagnostics),
      enabled: config.cache.enabled,
      timeout: config.cache.timeout,
      diagnostics: this.diagnostics,
    });

    const plan = cache.plan(useCache);
    let writeCache = plan.writeCache;
    let records: VmRecord[] | undefined;

    if (plan.readCache) {
      records = await cache.get(cacheKey);
      if (records === undefined) {
        writeCache = true;
      }
    }

    const fromCache = records !== undefined;
    if (records === undefined) {
      this.diagnostics.v(`Querying OpenNebula at ${config.url}`);
      records = await new VmRecordBuilder(api, this.diagnostics).query();
    }

    if (writeCache) {
      await cache.put(cacheKey, records);
    }

    const inventory = new Inventory();
    const evaluator = new ConstructedEvaluator(inventory, config.constructed, this.diagnostics);
    // Freshly built records carry every domain already; only cached ones may lag behind
    const resolver = new HostnameResolver({
      lookup: fromCache ? (networkId) => this.lookupDomain(api, networkId) : undefined,
      diagnostics: this.diagnostics,
    });

    const hostnames = await new InventoryPopulator({
      inventory,
      resolver,
      hostnamePreference: config.hostnamePreference,
      composer: evaluator,
      grouper: evaluator,
      strict: config.strict,
      diagnostics: this.diagnostics,
    }).populate(records);

    return { inventory, config, records, hostnames, cacheKey, fromCache };
  }

  private async lookupDomain(api: OneApi, networkId: string): Promise<string | undefined> {
    try {
      return await lookupNetworkDomain(api, networkId);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      this.diagnostics.vvv(`Network ID ${networkId} does not exist, no domain available`);
      return undefined;
    }
  }
}

/**
 * Configuration Types for one-inventory
 *
 * These types represent the YAML inventory configuration and the resolved
 * options with environment overrides and defaults applied.
 */

import type { CachePluginName } from '../cache/types.js';
import type { ConstructedRules, KeyedGroupRule } from '../core/constructed.js';
import type { HostnamePreference } from '../core/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root object parsed from a `*one.yaml` file
 */
export interface InventoryConfig {
  /** Name of the inventory plugin, informational */
  plugin?: string;
  /** OpenNebula XML-RPC endpoint. Default: http://localhost:2633/RPC2 */
  one_url?: string;
  /** Default: oneadmin */
  one_username?: string;
  one_password?: string;
  /** `fqdn` (default) or `name`; checked by the resolver */
  one_hostname_preference?: string;
  /** Per-request timeout in milliseconds. Default: 30000 */
  one_timeout?: number;
  /** Enable the query cache. Default: false */
  cache?: boolean;
  /** Default: jsonfile */
  cache_plugin?: CachePluginName;
  /** Directory for the jsonfile cache. Default: .one-inventory/cache next to the file */
  cache_connection?: string;
  /** Seconds before cached results expire; 0 never expires. Default: 3600 */
  cache_timeout?: number;
  /** Fail on compose/groups/keyed_groups errors. Default: false */
  strict?: boolean;
  compose?: Record<string, string>;
  groups?: Record<string, string>;
  keyed_groups?: KeyedGroupRule[];
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Inventory options ready for a run
 */
export interface ResolvedInventoryConfig {
  /** Absolute path to the YAML file */
  configPath: string;
  url: string;
  username: string;
  password: string;
  hostnamePreference: HostnamePreference;
  timeout: number;
  cache: {
    enabled: boolean;
    plugin: CachePluginName;
    /** Absolute directory for the jsonfile store */
    connection: string;
    timeout: number;
  };
  strict: boolean;
  constructed: ConstructedRules;
}

/**
 * Configuration Resolver
 *
 * Applies environment overrides and defaults to a validated inventory
 * configuration, checks enumerated options and expands paths.
 */

import { dirname, resolve } from 'node:path';

import type { InventoryConfig, ResolvedInventoryConfig } from './types.js';
import { ConfigError, InvalidOptionError } from '../core/errors.js';
import { HOSTNAME_PREFERENCES, isHostnamePreference } from '../core/types.js';
import { expandPath, getDefaultCacheDir } from '../lib/paths.js';

/**
 * Default values when not specified in config or environment
 */
export const DEFAULTS = {
  url: 'http://localhost:2633/RPC2',
  username: 'oneadmin',
  hostnamePreference: 'fqdn' as const,
  timeout: 30000,
  cache: false,
  cachePlugin: 'jsonfile' as const,
  cacheTimeout: 3600,
  strict: false,
};

/**
 * Environment variables that can supply connection options
 */
export const ENV_VARS = {
  url: 'ONE_URL',
  username: 'ONE_USERNAME',
  password: 'ONE_PASSWORD',
} as const;

/**
 * Read a non-empty environment variable.
 */
function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Resolve a complete configuration.
 *
 * Precedence for connection options: the file, then the environment, then
 * the defaults.
 *
 * @param config - Validated configuration from YAML
 * @param configPath - Path to the configuration file
 * @param env - Environment to read overrides from
 * @returns Options ready for a run
 * @throws InvalidOptionError if one_hostname_preference is not fqdn or name
 * @throws ConfigError if no password is configured
 */
export function resolveConfig(
  config: InventoryConfig,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): ResolvedInventoryConfig {
  const absoluteConfigPath = resolve(configPath);
  const basePath = dirname(absoluteConfigPath);

  const hostnamePreference = config.one_hostname_preference ?? DEFAULTS.hostnamePreference;
  if (!isHostnamePreference(hostnamePreference)) {
    throw new InvalidOptionError(
      'one_hostname_preference',
      hostnamePreference,
      HOSTNAME_PREFERENCES
    );
  }

  const password = config.one_password ?? fromEnv(env, ENV_VARS.password);
  if (password === undefined) {
    throw new ConfigError(
      'No OpenNebula password configured',
      'CONFIG_VALIDATION_FAILED',
      `Set one_password in ${absoluteConfigPath} or export ${ENV_VARS.password}.`,
      absoluteConfigPath
    );
  }

  const connectionRaw = config.cache_connection;

  return {
    configPath: absoluteConfigPath,
    url: config.one_url ?? fromEnv(env, ENV_VARS.url) ?? DEFAULTS.url,
    username: config.one_username ?? fromEnv(env, ENV_VARS.username) ?? DEFAULTS.username,
    password,
    hostnamePreference,
    timeout: config.one_timeout ?? DEFAULTS.timeout,
    cache: {
      enabled: config.cache ?? DEFAULTS.cache,
      plugin: config.cache_plugin ?? DEFAULTS.cachePlugin,
      connection:
        connectionRaw === undefined
          ? getDefaultCacheDir(absoluteConfigPath)
          : expandPath(connectionRaw, basePath),
      timeout: config.cache_timeout ?? DEFAULTS.cacheTimeout,
    },
    strict: config.strict ?? DEFAULTS.strict,
    constructed: {
      compose: config.compose ?? {},
      groups: config.groups ?? {},
      keyed_groups: config.keyed_groups ?? [],
    },
  };
}

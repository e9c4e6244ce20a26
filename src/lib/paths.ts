/**
 * Path Utilities
 *
 * Path expansion, cache locations and inventory file recognition.
 */

import { access, stat } from 'node:fs/promises';
import { constants } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';

/**
 * File name endings an inventory configuration must have
 */
export const INVENTORY_FILE_SUFFIXES = ['one.yaml', 'one.yml'] as const;

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded.startsWith('~')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  // Expand Unix-style $VAR environment variables
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  // Make relative paths absolute relative to config file directory
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the default cache directory for a given config file.
 *
 * @param configPath - Path to the configuration file
 * @returns Absolute path to .one-inventory/cache in the config file's directory
 */
export function getDefaultCacheDir(configPath: string): string {
  const absoluteConfigPath = resolve(configPath);
  const configDir = dirname(absoluteConfigPath);
  return join(configDir, '.one-inventory', 'cache');
}

/**
 * Check whether a file name is one this inventory source handles.
 */
export function hasInventorySuffix(path: string): boolean {
  return INVENTORY_FILE_SUFFIXES.some((suffix) => path.endsWith(suffix));
}

/**
 * Decide whether a path is an inventory configuration for this source:
 * an existing, readable file whose name ends in `one.yaml` or `one.yml`.
 * The file is not parsed.
 *
 * @param path - Candidate path
 */
export async function verifyFile(path: string): Promise<boolean> {
  if (!hasInventorySuffix(path)) {
    return false;
  }
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      return false;
    }
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

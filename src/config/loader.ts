/**
 * Configuration Loader
 *
 * Recognizes inventory configuration files and loads their YAML content.
 */

import { access, readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { INVENTORY_FILE_SUFFIXES, verifyFile } from '../lib/paths.js';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: 'not_found' | 'unreadable' | 'invalid_yaml' | 'unrecognized',
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Load and parse a YAML file.
 *
 * An empty document loads as an empty mapping.
 *
 * @param filePath - Path to the YAML file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(
        `Inventory file not found: ${filePath}`,
        filePath,
        'not_found',
        err
      );
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading inventory file: ${filePath}`,
        filePath,
        'unreadable',
        err
      );
    }
    throw new ConfigLoadError(
      `Failed to read inventory file: ${filePath}`,
      filePath,
      'unreadable',
      err
    );
  }

  try {
    return yaml.load(content, { filename: filePath }) ?? {};
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${err.message}`,
      filePath,
      'invalid_yaml',
      err
    );
  }
}

/**
 * Load an inventory configuration file.
 *
 * The file is only read when its name ends in one of the recognized
 * suffixes; other sources are rejected untouched.
 *
 * @param filePath - Path to the inventory configuration
 * @throws ConfigLoadError with reason `unrecognized` for other files
 */
export async function loadInventoryFile(filePath: string): Promise<unknown> {
  if (!(await verifyFile(filePath))) {
    const exists = await access(filePath).then(
      () => true,
      () => false
    );
    if (!exists) {
      throw new ConfigLoadError(`Inventory file not found: ${filePath}`, filePath, 'not_found');
    }
    throw new ConfigLoadError(
      `${filePath} is not an OpenNebula inventory file (expected a name ending in ${INVENTORY_FILE_SUFFIXES.join(' or ')})`,
      filePath,
      'unrecognized'
    );
  }
  return loadYamlFile(filePath);
}

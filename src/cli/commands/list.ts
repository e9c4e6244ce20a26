/**
 * List Command Handler
 *
 * Runs the inventory for a configuration file and prints its hosts, or
 * the Ansible inventory document with --json.
 */

import { InventorySource } from '../../core/source.js';
import { Logger } from '../../lib/logger.js';
import { createOutput } from '../output.js';
import { handleError } from './errors.js';

/**
 * Options for the list command
 */
export interface ListCommandOptions {
  json?: boolean;
  /** Query OpenNebula even when a cached result exists */
  refreshCache?: boolean;
  verbose?: number;
}

/**
 * Execute the list command.
 *
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function listCommand(file: string, options: ListCommandOptions): Promise<void> {
  const output = createOutput('list', options);
  const logger = Logger.fromOptions(options);

  try {
    const source = new InventorySource({ diagnostics: logger });
    const run = await source.parse(file, { useCache: options.refreshCache !== true });

    output.inventory(run);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

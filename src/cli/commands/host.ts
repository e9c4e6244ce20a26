/**
 * Host Command Handler
 *
 * Prints the variables of a single host.
 */

import { HostNotFoundError } from '../../core/errors.js';
import { InventorySource } from '../../core/source.js';
import { Logger } from '../../lib/logger.js';
import { createOutput } from '../output.js';
import { handleError } from './errors.js';

/**
 * Options for the host command
 */
export interface HostCommandOptions {
  json?: boolean;
  verbose?: number;
}

/**
 * Execute the host command.
 *
 * The cache is used as for `list`, so repeated lookups stay cheap.
 *
 * @param file - Path to the configuration file
 * @param hostname - Hostname as produced by the inventory
 * @param options - Command options
 */
export async function hostCommand(
  file: string,
  hostname: string,
  options: HostCommandOptions
): Promise<void> {
  const output = createOutput('host', options);
  const logger = Logger.fromOptions(options);

  try {
    const run = await new InventorySource({ diagnostics: logger }).parse(file);
    const vars = run.inventory.getHostVars(hostname);
    if (vars === undefined) {
      throw new HostNotFoundError(hostname);
    }

    output.hostVars(hostname, vars);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

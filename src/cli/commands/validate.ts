/**
 * Validate Command Handler
 *
 * Checks the file name, YAML syntax, schema and option values of an
 * inventory file without contacting OpenNebula.
 */

import { readInventoryConfig } from '../../core/source.js';
import { createOutput } from '../output.js';
import { handleError } from './errors.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * @param file - Path to the configuration file
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    output.info(`Validating configuration: ${file}`);
    const config = await readInventoryConfig(file);

    output.validationSuccess(config.configPath, config.url, {
      compose: Object.keys(config.constructed.compose).length,
      groups: Object.keys(config.constructed.groups).length,
      keyed_groups: config.constructed.keyed_groups.length,
    });
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}

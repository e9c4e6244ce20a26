/**
 * Shared error reporting for command handlers.
 */

import { ConfigError, getExitCode, isInventoryError } from '../../core/errors.js';
import type { OutputFormatter } from '../output.js';

/**
 * Report an error and exit with the code from the error taxonomy.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if (error instanceof ConfigError && error.validationErrors !== undefined) {
    output.validationError(error.validationErrors, error);
  } else if (isInventoryError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}

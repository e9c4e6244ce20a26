/**
 * Error Types for one-inventory
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all inventory errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'CONFIG_UNRECOGNIZED'
  | 'MISSING_DEPENDENCY'
  | 'INVALID_OPTION'
  | 'REMOTE_FAILURE'
  | 'NOT_FOUND'
  | 'UNKNOWN_STATE'
  | 'MALFORMED_VM'
  | 'CONSTRUCTION_FAILED'
  | 'HOST_NOT_FOUND';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  CONFIG_UNRECOGNIZED: 1,
  MISSING_DEPENDENCY: 2,
  INVALID_OPTION: 1,
  REMOTE_FAILURE: 2,
  NOT_FOUND: 1,
  UNKNOWN_STATE: 2,
  MALFORMED_VM: 2,
  CONSTRUCTION_FAILED: 1,
  HOST_NOT_FOUND: 1,
};

/**
 * Base error class for all inventory errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class InventoryError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'InventoryError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, InventoryError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/**
 * Error for configuration-related issues.
 */
export class ConfigError extends InventoryError {
  constructor(
    message: string,
    code:
      | 'CONFIG_NOT_FOUND'
      | 'CONFIG_INVALID_YAML'
      | 'CONFIG_VALIDATION_FAILED'
      | 'CONFIG_UNRECOGNIZED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * The runtime lacks something the remote client needs (e.g. a global fetch).
 */
export class MissingDependencyError extends InventoryError {
  constructor(message: string, public readonly dependency: string) {
    super(
      message,
      'MISSING_DEPENDENCY',
      'Run one-inventory on Node.js 20 or newer.'
    );
    this.name = 'MissingDependencyError';
    Object.setPrototypeOf(this, MissingDependencyError.prototype);
  }
}

/**
 * A recognized option holds a value outside its allowed set.
 */
export class InvalidOptionError extends InventoryError {
  constructor(
    public readonly option: string,
    public readonly value: unknown,
    public readonly choices: readonly string[]
  ) {
    super(
      `Invalid value for option ${option}: ${String(value)}`,
      'INVALID_OPTION',
      `Use one of: ${choices.join(', ')}`
    );
    this.name = 'InvalidOptionError';
    Object.setPrototypeOf(this, InvalidOptionError.prototype);
  }
}

/**
 * Error for OpenNebula calls that failed for any reason other than a
 * missing object.
 */
export class RemoteFailureError extends InventoryError {
  constructor(
    message: string,
    public readonly method?: string,
    public readonly remoteCode?: number
  ) {
    super(message, 'REMOTE_FAILURE', 'Check one_url, the credentials and that oned is reachable.');
    this.name = 'RemoteFailureError';
    Object.setPrototypeOf(this, RemoteFailureError.prototype);
  }
}

/**
 * The requested OpenNebula object does not exist.
 */
export class NotFoundError extends InventoryError {
  constructor(
    message: string,
    public readonly method?: string,
    public readonly objectId?: number
  ) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * A VM reported a lifecycle code that is not in the lookup tables.
 */
export class UnknownStateError extends InventoryError {
  constructor(
    public readonly kind: 'STATE' | 'LCM_STATE',
    public readonly value: string,
    public readonly vmName?: string
  ) {
    super(
      `VM ${vmName ?? '<unknown>'} reports unknown ${kind} value: ${value}`,
      'UNKNOWN_STATE'
    );
    this.name = 'UnknownStateError';
    Object.setPrototypeOf(this, UnknownStateError.prototype);
  }
}

/**
 * A pool VM lacks a usable numeric ID.
 */
export class MalformedVmError extends InventoryError {
  constructor(
    public readonly field: string,
    public readonly value: string | undefined,
    public readonly vmName?: string
  ) {
    super(
      `VM ${vmName ?? '<unknown>'} has an invalid ${field}: ${value ?? '<missing>'}`,
      'MALFORMED_VM'
    );
    this.name = 'MalformedVmError';
    Object.setPrototypeOf(this, MalformedVmError.prototype);
  }
}

/**
 * A compose, groups or keyed_groups rule could not be evaluated.
 */
export class ConstructionError extends InventoryError {
  constructor(
    message: string,
    public readonly hostname: string,
    public readonly rule: string
  ) {
    super(message, 'CONSTRUCTION_FAILED', 'Fix the expression or set strict: false.');
    this.name = 'ConstructionError';
    Object.setPrototypeOf(this, ConstructionError.prototype);
  }
}

/**
 * The `host` command was asked for a hostname the run did not produce.
 */
export class HostNotFoundError extends InventoryError {
  constructor(public readonly hostname: string) {
    super(
      `Host not found in inventory: ${hostname}`,
      'HOST_NOT_FOUND',
      'Run `one-inventory list <file>` to see the available hostnames.'
    );
    this.name = 'HostNotFoundError';
    Object.setPrototypeOf(this, HostNotFoundError.prototype);
  }
}

/**
 * Check if an error is an InventoryError.
 */
export function isInventoryError(error: unknown): error is InventoryError {
  return error instanceof InventoryError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isInventoryError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}

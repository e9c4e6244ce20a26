/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, InventoryError } from '../core/errors.js';
import type { HostVars } from '../core/inventory.js';
import type { InventoryRun } from '../core/source.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  error?: ErrorOutput;
  summary?: Record<string, number>;
  [key: string]: unknown;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * One row of the human-readable host table
 */
export interface HostRow {
  hostname: string;
  id: string;
  state: string;
  lcmState: string;
  groups: string;
}

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON document
 * at flush. Commands that print an inventory document replace the command
 * result with that document.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private document: unknown;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  isJson(): boolean {
    return this.mode === 'json';
  }

  private indent(): void {
    this.indentLevel++;
  }

  private dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message. Errors always go to stderr in human mode.
   */
  error(message: string, error?: InventoryError): void {
    this.result.success = false;
    this.document = undefined;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Inventory Output
  // ===========================================================================

  /**
   * Print the hosts of a run, or the Ansible inventory document in JSON mode.
   */
  inventory(run: InventoryRun): void {
    if (this.mode === 'json') {
      this.document = run.inventory.toAnsibleJson();
      return;
    }

    const rows = buildHostRows(run).map((row) => [
      row.hostname,
      row.id,
      row.state,
      row.lcmState,
      row.groups,
    ]);

    if (rows.length === 0) {
      this.info('No virtual machines found.');
    } else {
      this.table(['HOSTNAME', 'ID', 'STATE', 'LCM STATE', 'GROUPS'], rows);
    }

    const hosts = run.inventory.getHostnames().length;
    const groups = run.inventory.getGroupNames().length;
    this.newline();
    this.info(
      `${hosts} host${hosts === 1 ? '' : 's'}, ${groups} group${groups === 1 ? '' : 's'}` +
        (run.fromCache ? ' (from cache).' : '.')
    );
  }

  /**
   * Print the variables of one host.
   */
  hostVars(hostname: string, vars: HostVars): void {
    if (this.mode === 'json') {
      this.document = vars;
      return;
    }

    this.info(`Host: ${hostname}`);
    this.indent();
    for (const key of Object.keys(vars).sort()) {
      this.info(`${key}: ${formatValue(vars[key])}`);
    }
    this.dedent();
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  /**
   * Print validation success.
   */
  validationSuccess(configPath: string, url: string, rules: Record<string, number>): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`File: ${configPath}`);
      this.info(`Endpoint: ${url}`);
      this.info(
        `Rules: ${rules['compose'] ?? 0} compose, ${rules['groups'] ?? 0} groups, ${rules['keyed_groups'] ?? 0} keyed_groups`
      );
      this.dedent();
    }

    this.result['url'] = url;
    this.result.summary = { ...rules };
  }

  /**
   * Print validation errors.
   */
  validationError(errors: Array<{ path: string; message: string }>, error?: InventoryError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Configuration invalid', error);
      this.newline();
      for (const err of errors) {
        console.error(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'CONFIG_VALIDATION_FAILED',
      message: error?.message ?? 'Configuration validation failed',
      suggestion: error?.suggestion,
      details: { errors },
    };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the inventory document if one was set, otherwise
   * the collected command result.
   */
  flush(): void {
    if (this.mode === 'json') {
      const payload = this.document ?? this.result;
      console.log(JSON.stringify(payload, null, 2));
    }
  }

  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Rows for the host table, in the order hosts were added.
 */
export function buildHostRows(run: InventoryRun): HostRow[] {
  return run.inventory.getHostnames().map((hostname) => {
    const vars = run.inventory.getHostVars(hostname) ?? {};
    return {
      hostname,
      id: formatValue(vars['id']),
      state: formatValue(vars['state']),
      lcmState: formatValue(vars['lcm_state']),
      groups: run.inventory.getHostGroups(hostname).join(',') || '-',
    };
  });
}

/**
 * Render a host variable on one line.
 */
export function formatValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}

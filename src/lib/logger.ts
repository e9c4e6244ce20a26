/**
 * Logger for one-inventory
 *
 * Leveled diagnostics written to stderr so that stdout only ever carries
 * command output. Instances are passed explicitly to the components that
 * log; there is no global logger.
 */

/**
 * Verbosity level, 0 (quiet) to 4 (-vvvv)
 */
export type Verbosity = 0 | 1 | 2 | 3 | 4;

/**
 * Diagnostics sink accepted by every pipeline component.
 *
 * `v` through `vvvv` are only emitted when the configured verbosity is at
 * least 1 through 4. Warnings are always emitted.
 */
export interface Diagnostics {
  v(message: string): void;
  vv(message: string): void;
  vvv(message: string): void;
  vvvv(message: string): void;
  warning(message: string): void;
}

/**
 * Line writer used by the logger (stderr by default).
 */
export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  console.error(line);
};

/**
 * Logger class gating messages on a verbosity level.
 */
export class Logger implements Diagnostics {
  private readonly verbosity: Verbosity;
  private readonly write: LogWriter;

  constructor(verbosity: number = 0, write: LogWriter = stderrWriter) {
    this.verbosity = clampVerbosity(verbosity);
    this.write = write;
  }

  v(message: string): void {
    this.emit(1, message);
  }

  vv(message: string): void {
    this.emit(2, message);
  }

  vvv(message: string): void {
    this.emit(3, message);
  }

  vvvv(message: string): void {
    this.emit(4, message);
  }

  /**
   * Log a warning message regardless of verbosity.
   */
  warning(message: string): void {
    this.write(`[WARNING]: ${message}`);
  }

  private emit(level: Verbosity, message: string): void {
    if (this.verbosity >= level) {
      this.write(message);
    }
  }

  /**
   * Create a logger from CLI options.
   */
  static fromOptions(options: { verbose?: number }): Logger {
    return new Logger(options.verbose ?? 0);
  }
}

/**
 * Diagnostics sink that discards everything.
 */
export const silentDiagnostics: Diagnostics = {
  v: () => undefined,
  vv: () => undefined,
  vvv: () => undefined,
  vvvv: () => undefined,
  warning: () => undefined,
};

function clampVerbosity(value: number): Verbosity {
  if (!Number.isFinite(value) || value <= 0) return 0;
  if (value >= 4) return 4;
  const level = Math.floor(value);
  return level === 1 ? 1 : level === 2 ? 2 : 3;
}

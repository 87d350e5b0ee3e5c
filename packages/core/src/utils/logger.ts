import consola from "consola";

/**
 * Logger abstraction for irkit
 *
 * Allows swapping between different logging implementations:
 * - consola (CLI) - Rich terminal output with colors and icons
 * - Memory logger - Records entries so callers can inspect what was logged
 * - Silent logger (testing) - No-op for tests or silent mode
 */
export interface IrkitLogger {
  /** Log an informational message */
  info(message: string): void;
  /** Log a success message */
  success(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /** Log an error message */
  error(message: string): void;
  /** Log a "starting" message */
  start(message: string): void;
  /** Log a diagnostic message (hidden unless verbose) */
  debug(message: string): void;
  /** Log a boxed message (for summaries) */
  box(options: { title: string; message: string }): void;
}

export type LogLevel = keyof IrkitLogger;

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Create a logger that uses consola for rich terminal output.
 * This is the default logger used by the CLI.
 */
export function createConsolaLogger(
  options: { verbose?: boolean } = {},
): IrkitLogger {
  const instance = options.verbose ? consola.create({ level: 4 }) : consola;

  return {
    info: (message) => instance.info(message),
    success: (message) => instance.success(message),
    warn: (message) => instance.warn(message),
    error: (message) => instance.error(message),
    start: (message) => instance.start(message),
    debug: (message) => instance.debug(message),
    box: (options) => instance.box(options),
  };
}

/**
 * Create a logger that keeps every entry in memory.
 */
export function createMemoryLogger(): IrkitLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  return {
    entries,
    info: record("info"),
    success: record("success"),
    warn: record("warn"),
    error: record("error"),
    start: record("start"),
    debug: record("debug"),
    box: (options) => {
      entries.push({
        level: "box",
        message: `${options.title}\n${options.message}`,
      });
    },
  };
}

/**
 * Create a silent logger that does nothing.
 * Useful for testing or when output should be suppressed.
 */
export function createSilentLogger(): IrkitLogger {
  const noop = () => {};
  return {
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    start: noop,
    debug: noop,
    box: noop,
  };
}

/**
 * Default logger instance using consola.
 * Used when no logger is explicitly provided.
 */
export const defaultLogger = createConsolaLogger();

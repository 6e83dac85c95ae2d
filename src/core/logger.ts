/**
 * Minimal logging surface; `console` satisfies it directly
 */
export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Console logger that drops debug output unless verbose
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    debug: (...args) => {
      if (verbose) console.log(...args);
    },
    info: (...args) => console.log(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };
}

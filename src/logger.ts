/**
 * Operator-facing log output
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger writing info and debug lines to stdout, warnings and errors to stderr.
 * Debug lines are dropped unless `verbose` is set.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose) {
      console.log(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args);
  }
}

/**
 * Prefixed console logger
 *
 * info goes to stdout, warn/error to stderr. debug lines are printed only
 * when the DEBUG environment variable is set, so a normal run prints a
 * single status line.
 */

export class Logger {
  constructor(private readonly prefix: string) {}

  private format(message: string): string {
    return `[${this.prefix}] ${message}`;
  }

  info(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.format(message), ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (process.env.DEBUG) {
      console.log(this.format(message), ...args);
    }
  }
}

/**
 * Create a logger for a component
 */
export function createLogger(prefix: string): Logger {
  return new Logger(prefix);
}

/**
 * Console logging.
 *
 * Everything goes to stderr so stdout stays clean for command output
 * (a resolved value piped into another program, or --json).
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

export class ConsoleLogger implements Logger {
  readonly debugEnabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.error(`[debug] ${message}`);
    }
  }

  info(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.error(`⚠️  ${message}`);
  }

  error(message: string): void {
    console.error(`❌ ${message}`);
  }
}

/** Logger that drops everything; the default for library use. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger for the CLI. Debug output is on with --debug or SECRET_ROUTER_DEBUG=1.
 */
export function createLogger(options: LoggerOptions = {}): ConsoleLogger {
  const fromEnv = process.env.SECRET_ROUTER_DEBUG === '1' || process.env.SECRET_ROUTER_DEBUG === 'true';
  return new ConsoleLogger({ debug: options.debug || fromEnv });
}

/**
 * Hide a secret-bearing string in log output, keeping only its length.
 */
export function mask(value: string | undefined): string {
  if (!value) return '(empty)';
  return `[REDACTED ${value.length} chars]`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Emit debug lines (default: LOG_DEBUG=1) */
  debug?: boolean;
}

/**
 * Console logger that prefixes every line with `[tag]`.
 * Extra args go straight to console so errors keep their stack.
 */
export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? process.env.LOG_DEBUG === '1';
  const prefix = `[${tag}]`;
  return {
    debug(message, ...args) {
      if (debugEnabled) console.log(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args);
    },
  };
}

/**
 * Minimal structured logger contract shared by all Hearth packages.
 *
 * Packages accept a `Logger` in their config and fall back to
 * `createConsoleLogger()` when none is supplied.
 */

export interface Logger {
  debug(message: string, data?: Readonly<Record<string, unknown>>): void;
  info(message: string, data?: Readonly<Record<string, unknown>>): void;
  warn(message: string, data?: Readonly<Record<string, unknown>>): void;
  error(message: string, data?: Readonly<Record<string, unknown>>): void;
}

/**
 * Console-backed logger: `[tag] message`, with structured data appended.
 */
export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message, data) {
      if (data) console.debug(`${prefix} ${message}`, data);
      else console.debug(`${prefix} ${message}`);
    },
    info(message, data) {
      if (data) console.info(`${prefix} ${message}`, data);
      else console.info(`${prefix} ${message}`);
    },
    warn(message, data) {
      if (data) console.warn(`${prefix} ${message}`, data);
      else console.warn(`${prefix} ${message}`);
    },
    error(message, data) {
      if (data) console.error(`${prefix} ${message}`, data);
      else console.error(`${prefix} ${message}`);
    },
  };
}

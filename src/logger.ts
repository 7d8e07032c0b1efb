export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

const PREFIX = "[TUF]";

const noop = (): void => {};

/**
 * Console backed logger. Debug output is dropped unless `verbose` is set,
 * warnings always go to stderr.
 */
export function consoleLogger(verbose: boolean = false): Logger {
  return {
    debug: verbose
      ? (message, ...args) => console.debug(`${PREFIX} ${message}`, ...args)
      : noop,
    info: (message, ...args) => console.info(`${PREFIX} ${message}`, ...args),
    warn: (message, ...args) => console.warn(`${PREFIX} ${message}`, ...args),
  };
}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
};

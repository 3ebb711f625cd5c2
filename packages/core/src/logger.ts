import type { Logger } from './types';

/**
 * Console logger with a `[scope]` prefix. Debug output is dropped unless enabled.
 */
export function createLogger(scope: string, options: { debug?: boolean; sink?: Logger } = {}) {
  const sink = options.sink ?? console;
  const prefix = `[${scope}]`;
  const logger: Required<Logger> = {
    info: (message, ...args) => sink.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => sink.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => sink.error(`${prefix} ${message}`, ...args),
    debug: (message, ...args) => {
      if (!options.debug) {
        return;
      }
      (sink.debug ?? sink.info)(`${prefix} ${message}`, ...args);
    },
  };
  return logger;
}

export const silentLogger: Required<Logger> = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

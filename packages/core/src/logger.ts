/**
 * Logging contract for cache components
 *
 * Tiers never throw on I/O failures; they report them here instead.
 */

export interface CacheLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const PREFIX = '[tiercache]';

function withContext(message: string, context?: Record<string, unknown>): unknown[] {
  return context ? [`${PREFIX} ${message}`, context] : [`${PREFIX} ${message}`];
}

/**
 * Default logger: warnings and errors go to the console, the rest is dropped
 */
export const consoleLogger: CacheLogger = {
  debug: () => {},
  info: () => {},
  warn: (message, context) => console.warn(...withContext(message, context)),
  error: (message, context) => console.error(...withContext(message, context)),
};

/**
 * Logger that discards everything
 */
export const silentLogger: CacheLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger that writes every level to stderr (used by the CLI's --verbose)
 */
export function createVerboseLogger(write: (line: string) => void = (line) => console.error(line)): CacheLogger {
  const emit =
    (level: string) =>
    (message: string, context?: Record<string, unknown>): void => {
      const suffix = context ? ` ${JSON.stringify(context)}` : '';
      write(`${PREFIX} ${level} ${message}${suffix}`);
    };
  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

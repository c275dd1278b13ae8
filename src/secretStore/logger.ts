/**
 * Console-like logger contract used across this package.
 *
 * The same logger is handed to the AWS SDK client, so custom loggers must
 * implement these methods (no internal polyfills are applied).
 */
export type Logger = Pick<Console, 'debug' | 'error' | 'info' | 'warn'>;

export const assertLogger = (candidate: unknown): Logger => {
  if (!candidate || typeof candidate !== 'object') {
    throw new Error(
      'logger must be an object with debug, info, warn, and error methods',
    );
  }
  const logger = candidate as Partial<Logger>;
  if (
    typeof logger.debug !== 'function' ||
    typeof logger.info !== 'function' ||
    typeof logger.warn !== 'function' ||
    typeof logger.error !== 'function'
  ) {
    throw new Error(
      'logger must implement debug, info, warn, and error methods; wrap/proxy your logger if needed',
    );
  }
  return logger as Logger;
};

/** Console logger with debug output suppressed. */
export const quietLogger: Logger = {
  debug: () => undefined,
  info: (...args: unknown[]) => {
    console.info(...args);
  },
  warn: (...args: unknown[]) => {
    console.warn(...args);
  },
  error: (...args: unknown[]) => {
    console.error(...args);
  },
};

/**
 * Tagged console logger.
 *
 * Lines are formatted `[tag] message`. Debug output is off unless
 * FNBRIDGE_DEBUG is "true" or "1".
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.FNBRIDGE_DEBUG;
  return value === "true" || value === "1";
}

export function createLogger(tag: string): Logger {
  return {
    debug(message) {
      if (isDebugEnabled()) {
        console.debug(`[${tag}] ${message}`);
      }
    },
    info(message) {
      console.info(`[${tag}] ${message}`);
    },
    warn(message) {
      console.warn(`[${tag}] ${message}`);
    },
    error(message) {
      console.error(`[${tag}] ${message}`);
    },
  };
}

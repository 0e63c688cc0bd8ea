/**
 * Scoped console logger. Everything goes to stderr so stdout stays
 * reserved for search output.
 */

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

function debugEnabled(): boolean {
  const flag = process.env.CDP_SEARCH_DEBUG;
  return flag !== undefined && flag !== "" && flag !== "0" && flag !== "false";
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(...args) {
      if (debugEnabled()) {
        console.error(prefix, ...args);
      }
    },
    info(...args) {
      console.error(prefix, ...args);
    },
    warn(...args) {
      console.warn(prefix, ...args);
    },
    error(...args) {
      console.error(prefix, ...args);
    },
  };
}

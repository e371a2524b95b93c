/* eslint-disable no-console */

export type Logger = {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};

function debugEnabled() {
  return process.env.STREAMSCRIBE_DEBUG_LOGS === "true";
}

/**
 * Console logger with a `[scope]` prefix. Debug output is opt-in via
 * `STREAMSCRIBE_DEBUG_LOGS=true`.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  function write(fn: (...args: unknown[]) => void, message: string, data?: Record<string, unknown>) {
    if (data && Object.keys(data).length > 0) fn(prefix, message, data);
    else fn(prefix, message);
  }

  return {
    debug(message, data) {
      if (!debugEnabled()) return;
      write(console.debug, message, data);
    },
    info(message, data) {
      write(console.log, message, data);
    },
    warn(message, data) {
      write(console.warn, message, data);
    },
    error(message, data) {
      write(console.error, message, data);
    },
  };
}

// Paper Script Pipeline - Console logging
// Every component takes a Logger so tests can inject vi.fn() spies.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Console logger that tags each line with level and component:
 *   [INFO] [FactChecker] message
 * DEBUG lines are only printed when LOG_LEVEL=debug.
 */
export function createConsoleLogger(component: string): Logger {
  const tag = (level: string, msg: string) => `[${level}] [${component}] ${msg}`;
  return {
    debug: (msg, ...args) => {
      if (process.env.LOG_LEVEL === "debug") console.debug(tag("DEBUG", msg), ...args);
    },
    info: (msg, ...args) => console.log(tag("INFO", msg), ...args),
    warn: (msg, ...args) => console.warn(tag("WARN", msg), ...args),
    error: (msg, ...args) => console.error(tag("ERROR", msg), ...args),
  };
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export const defaultLogger: Logger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

/** Wraps a logger so every line carries a `[component]` tag. */
export function withComponent(logger: Logger, component: string): Logger {
  return {
    info: (msg, ...args) => logger.info(`[${component}] ${msg}`, ...args),
    warn: (msg, ...args) => logger.warn(`[${component}] ${msg}`, ...args),
    error: (msg, ...args) => logger.error(`[${component}] ${msg}`, ...args),
  };
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

// Debug opt-in: PASTEMD_DEBUG=1
const debugEnabled = () => process.env.PASTEMD_DEBUG === "1";

export const createLogger = (scope: string): Logger => {
  const prefix = `[${scope}]`;
  return {
    debug(message, data) {
      if (!debugEnabled()) return;
      if (data) console.error(`${prefix} ${message}`, data);
      else console.error(`${prefix} ${message}`);
    },
    info(message) {
      console.error(`${prefix} ${message}`);
    },
    warn(message, data) {
      if (data) console.warn(`${prefix} ${message}`, data);
      else console.warn(`${prefix} ${message}`);
    },
    error(message, error) {
      if (error === undefined) console.error(`${prefix} ${message}`);
      else console.error(`${prefix} ${message}`, error);
    },
  };
};

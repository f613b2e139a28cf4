export interface OnsetLogger {
  log(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, error?: unknown, details?: Record<string, unknown>): void;
}

const PREFIX = "[onset]";

export const consoleLogger: OnsetLogger = {
  log(message, details) {
    if (details) {
      console.log(`${PREFIX} ${message}`, details);
    } else {
      console.log(`${PREFIX} ${message}`);
    }
  },
  warn(message, details) {
    if (details) {
      console.warn(`${PREFIX} ${message}`, details);
    } else {
      console.warn(`${PREFIX} ${message}`);
    }
  },
  error(message, error, details) {
    if (details) {
      console.error(`${PREFIX} ${message}`, error, details);
    } else {
      console.error(`${PREFIX} ${message}`, error);
    }
  },
};

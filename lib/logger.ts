export interface Logger {
  log: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

export const consoleLogger: Logger = {
  log: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export const silentLogger: Logger = {
  log: () => undefined,
};

export function logWarn(logger: Logger, ...args: unknown[]) {
  (logger.warn ?? logger.log)(...args);
}

export function logError(logger: Logger, ...args: unknown[]) {
  (logger.error ?? logger.warn ?? logger.log)(...args);
}

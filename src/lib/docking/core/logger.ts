export interface DockLogger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  prefix?: string;
  debug?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): DockLogger {
  const prefix = options.prefix ?? '[Docking]';
  const debugEnabled = options.debug ?? false;
  return {
    debug(message, ...details) {
      if (debugEnabled) {
        console.debug(`${prefix} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}

export const silentLogger: DockLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

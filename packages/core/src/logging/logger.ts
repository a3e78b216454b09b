import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface LoggingOptions {
  level?: LogLevel;
  /** Enables the file transport, writing to this path. */
  filePath?: string;
}

// File output stays off until the host opts in.
log.transports.file.level = false;
log.transports.console.level = 'info';

export const configureLogging = (options: LoggingOptions = {}) => {
  const level = options.level ?? 'info';
  log.transports.console.level = level;
  const { filePath } = options;
  if (filePath) {
    log.transports.file.resolvePathFn = () => filePath;
    log.transports.file.level = level;
  } else {
    log.transports.file.level = false;
  }
};

export const createLogger = (scope: string) => log.scope(scope);

export type Logger = ReturnType<typeof createLogger>;

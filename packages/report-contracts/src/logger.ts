/**
 * Logging contract
 *
 * Components receive a logger instead of writing to the console directly.
 */

export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Prefix printed in front of every line, e.g. `report-snapshot` */
  component?: string;
  /** Lowest level that is written (default: `info`) */
  level?: LogLevel;
}

/**
 * Logger backed by the global console.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const prefix = options.component ? `[${options.component}] ` : '';

  const write = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const line = `${prefix}${message}`;
    const args: unknown[] = meta && Object.keys(meta).length > 0 ? [line, meta] : [line];
    console[level](...args);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, error, meta) =>
      write('error', message, error ? { ...meta, error: error.message } : meta),
  };
}

export const noopLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

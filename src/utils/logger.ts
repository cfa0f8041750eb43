import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red.bold,
};

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta) return '';
  const parts = Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return parts.length > 0 ? ' ' + chalk.gray(parts.join(' ')) : '';
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  prefix?: string;
}

/**
 * Console logger in the CLI's palette. Warnings and errors go to stderr so a
 * JSON report on stdout stays parseable.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = options.prefix ?? '[sentinel]';

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (level === 'debug' && !options.verbose) return;
    const line = `${chalk.gray(prefix)} ${LEVEL_COLORS[level](level.toUpperCase().padEnd(5))} ${message}${formatMeta(meta)}`;
    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}

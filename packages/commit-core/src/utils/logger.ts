/**
 * Process logger
 *
 * Call useLogger() anywhere instead of passing a logger through arguments.
 */

import chalk from 'chalk';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
}

export interface LoggerOptions {
  /** Emit debug records */
  debug?: boolean;
  /** Output sink, stderr by default */
  write?: (line: string) => void;
}

function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  return ' ' + chalk.gray(JSON.stringify(meta));
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const debugEnabled = options.debug ?? false;

  return {
    debug(message, meta) {
      if (debugEnabled) {
        write(`${chalk.magenta('debug')} ${message}${formatMeta(meta)}`);
      }
    },
    info(message, meta) {
      write(`${chalk.cyan('info')}  ${message}${formatMeta(meta)}`);
    },
    warn(message, meta) {
      write(`${chalk.yellow('warn')}  ${message}${formatMeta(meta)}`);
    },
    error(message, error, meta) {
      const reason = error instanceof Error ? error.message : error !== undefined ? String(error) : undefined;
      const merged = reason ? { ...meta, error: reason } : meta;
      write(`${chalk.red('error')} ${message}${formatMeta(merged)}`);
    },
  };
}

let current: Logger = createLogger();

/**
 * Replace the process logger (CLI startup, tests)
 */
export function configureLogger(options: LoggerOptions): Logger {
  current = createLogger(options);
  return current;
}

export function useLogger(): Logger {
  return current;
}

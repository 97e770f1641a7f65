/**
 * Levelled console logging.
 *
 * @module logger
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Logger used by the converter, watcher and CLI.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger that discards everything. Default for library use.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Where log lines go. `info` and `debug` use stdout, the rest stderr.
 */
export interface LogSink {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleSink: LogSink = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

/**
 * Create a console logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = 'info', sink: LogSink = consoleSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel): boolean => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: message => {
      if (enabled('debug')) sink.stdout(chalk.dim(message));
    },
    info: message => {
      if (enabled('info')) sink.stdout(message);
    },
    warn: message => {
      if (enabled('warn')) sink.stderr(chalk.yellow(message));
    },
    error: message => {
      if (enabled('error')) sink.stderr(chalk.red(message));
    },
  };
}

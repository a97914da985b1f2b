/**
 * @tessera/build — Logging
 */

import { cyan, dim, red, yellow } from 'kolorist';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. @default 'info' */
  level?: LogLevel;
  /** Prefix for every line. @default '[tessera]' */
  prefix?: string;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = 'info', prefix = '[tessera]' } = options;
  const enabled = (l: LogLevel): boolean => RANK[l] >= RANK[level];
  const tag = cyan(prefix);

  return {
    debug(message) {
      if (enabled('debug')) console.log(`${tag} ${dim(message)}`);
    },
    info(message) {
      if (enabled('info')) console.log(`${tag} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${tag} ${yellow(message)}`);
    },
    error(message) {
      if (enabled('error')) console.error(`${tag} ${red(message)}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

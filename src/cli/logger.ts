import chalk from 'chalk';
import type { LogLevelName } from '../config/index.js';

const LEVEL_ORDER: Record<LogLevelName, number> = {
  error: 0,
  info: 1,
  debug: 2,
};

export interface Logger {
  readonly level: LogLevelName;
  error(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

/**
 * Diagnostics go to stderr so stdout stays clean for documents and payloads.
 * Errors are written at every level.
 */
export function createLogger(
  level: LogLevelName,
  write: (line: string) => void = line => console.error(line),
): Logger {
  const enabled = (wanted: LogLevelName) => LEVEL_ORDER[level] >= LEVEL_ORDER[wanted];

  return {
    level,
    error(message) {
      write(chalk.red(`Error: ${message}`));
    },
    info(message) {
      if (enabled('info')) write(chalk.cyan(message));
    },
    debug(message) {
      if (enabled('debug')) write(chalk.gray(`[debug] ${message}`));
    },
  };
}

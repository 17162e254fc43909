import ora, { type Ora } from 'ora';
import type { Config } from '../config/index.js';
import type { Logger } from './logger.js';

/**
 * Format bytes to human readable string (B, KB, MB)
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export interface Progress {
  update(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

/**
 * Spinner on stderr when it is a TTY. Otherwise intermediate steps go to the
 * debug log and the final result to the info log.
 */
export function startProgress(text: string, config: Config, logger: Logger): Progress {
  const interactive = config.spinner === 'auto'
    && logger.level !== 'error'
    && Boolean(process.stderr.isTTY);

  if (!interactive) {
    logger.debug(text);
    return {
      update: next => logger.debug(next),
      succeed: done => logger.info(done),
      fail: failed => logger.debug(failed),
    };
  }

  const spinner: Ora = ora({ text, stream: process.stderr }).start();
  return {
    update: next => {
      spinner.text = next;
    },
    succeed: done => {
      spinner.succeed(done);
    },
    fail: failed => {
      spinner.fail(failed);
    },
  };
}

/**
 * Logger factory for the CLI.
 *
 * Logs go to stderr so stdout stays free for the run summary. Interactive
 * terminals get pino-pretty output; pipes and CI get JSON lines.
 */

import { destination, pino } from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  /** Force debug level */
  verbose?: boolean;
  /** Explicit level, otherwise LOG_LEVEL or 'info' */
  level?: string;
}

export function resolveLogLevel(options?: LoggerOptions): string {
  if (options?.verbose) return 'debug';
  return options?.level ?? process.env['LOG_LEVEL'] ?? 'info';
}

export function createLogger(options?: LoggerOptions): Logger {
  const level = resolveLogLevel(options);

  if (process.stderr.isTTY) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level }, destination(2));
}

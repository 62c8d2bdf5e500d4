/**
 * Logging with Pino.
 *
 * Logs go to stderr so stdout stays free for command output.
 */

import { pino, destination, type Logger, type DestinationStream } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** Pretty-print through pino-pretty (interactive terminals) */
  pretty?: boolean;
  /** Custom sink, mainly for tests */
  destination?: DestinationStream;
}

const REDACT_PATHS = ['apiKey', '*.apiKey', 'authorization', '*.authorization', 'headers.authorization'];

export function createLogger(opts: LoggerOptions = {}): Logger {
  const base = {
    level: opts.level ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  };

  if (opts.destination) {
    return pino(base, opts.destination);
  }

  if (opts.pretty) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(base, destination(2));
}

/** Logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Diagnostic logging
 *
 * @packageDocumentation
 */

import pino, { type DestinationStream, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Emit informational diagnostics (deletions, recoveries) */
  verbose?: boolean;
  /** File descriptor, path or stream for log lines; stderr by default */
  destination?: number | string | DestinationStream;
}

/**
 * Creates the diagnostic logger. Log lines never go to stdout, which
 * carries the rewritten message.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = options.destination ?? 2;
  return pino(
    {
      name: 'rendmail',
      level: options.verbose ? 'info' : 'warn',
    },
    typeof destination === 'object'
      ? destination
      : pino.destination({ dest: destination, sync: true })
  );
}

/**
 * Logger that discards everything, for tests and embedding callers
 */
export const silentLogger: Logger = pino({ level: 'silent' });

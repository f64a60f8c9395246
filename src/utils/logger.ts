/**
 * Logger utility using pino
 */

import pino from 'pino';
import type { Logger } from 'pino';

export interface LoggingOptions {
  level: string;
  pretty: boolean;
}

let processLogger: Logger | null = null;

export function createLogger(config: LoggingOptions): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({
    level: config.level,
  });
}

/**
 * Process-wide logger. The first call decides the level and format; later
 * calls get the same instance back.
 */
export function setupLogging(config: LoggingOptions): Logger {
  if (!processLogger) {
    processLogger = createLogger(config);
  }
  return processLogger;
}

export type { Logger };

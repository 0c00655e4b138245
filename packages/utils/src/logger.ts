/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export interface LoggerOptions {
  level?: string;
  env?: string;
  service?: string;
}

export type Logger = PinoLogger;

export function createRootLogger(options: LoggerOptions = {}): Logger {
  const env = options.env ?? process.env['NODE_ENV'] ?? 'development';

  return pino({
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: options.service ?? 'torrent-relay',
      env,
    },
    transport: env === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}

export const logger = createRootLogger();

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}

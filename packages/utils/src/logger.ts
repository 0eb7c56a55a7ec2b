/**
 * Logger
 * 
 * Pino-based structured logger shared by every package.
 * Level comes from LOG_LEVEL; pretty output only in development.
 */

import { pino } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'transcoder',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
      translateTime: 'HH:MM:ss.l',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Child logger scoped to one transcode job
 */
export function createJobLogger(jobId: string, context: Record<string, unknown> = {}): Logger {
  return createLogger({ jobId, ...context });
}

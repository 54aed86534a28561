import pino, { type Logger } from 'pino';

/**
 * Application logger using Pino
 *
 * Pretty printed while developing, structured JSON in production.
 * Tests run without the pretty transport so no worker thread outlives them.
 */

const env = process.env.NODE_ENV || 'development';
const usePrettyTransport = env !== 'production' && env !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',

  transport: usePrettyTransport ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env,
  },
});

/**
 * Create a child logger with specific context
 * Useful for adding consistent metadata to logs
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
